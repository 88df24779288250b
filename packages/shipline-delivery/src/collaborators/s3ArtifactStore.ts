import { ok, type ArtifactStore } from '@shipline/core'

import type { CollaboratorSession } from './contracts.js'
import { runTool, shellQuote } from './shellTool.js'

/**
 * Strips a leading `s3://` and surrounding slashes from a bucket name.
 */
export const normalizeBucketName = (bucket: string): string => {
  return bucket.replace(/^s3:\/\//u, '').replace(/^\/+|\/+$/gu, '')
}

/**
 * Artifact store backed by `aws s3 cp`.
 *
 * @param session Stage session.
 * @param bucket Bucket name, with or without `s3://`.
 */
export const createS3ArtifactStore = (session: CollaboratorSession, bucket: string): ArtifactStore => {
  const toUrl = (remoteKey: string): string => {
    return `s3://${normalizeBucketName(bucket)}/${remoteKey.replace(/^\/+/u, '')}`
  }

  return {
    upload: async (localPath, remoteKey) => {
      const url = toUrl(remoteKey)
      const result = await runTool(session, `aws s3 cp ${shellQuote(localPath)} ${shellQuote(url)}`)
      return result.ok ? ok(url) : result
    },
    download: async (remoteKey, localPath) => {
      const result = await runTool(
        session,
        `aws s3 cp ${shellQuote(toUrl(remoteKey))} ${shellQuote(localPath)}`
      )
      return result.ok ? ok(localPath) : result
    },
  }
}
