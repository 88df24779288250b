import type { PipelineError } from '../errors/pipelineErrors.js'
import type { Result } from './result.js'

/**
 * Published artifact shown in run reports.
 */
export interface ArtifactLink {
  readonly label: string
  readonly url: string
}

/**
 * Client for the artifact or object storage service.
 */
export interface ArtifactStore {
  /**
   * Publishes a local file.
   *
   * @param localPath Path of the file to upload.
   * @param remoteKey Destination key inside the store.
   * @returns Remote URL of the stored artifact.
   */
  upload(localPath: string, remoteKey: string): Promise<Result<string, PipelineError>>

  /**
   * Fetches a stored artifact.
   *
   * @param remoteKey Key inside the store.
   * @param localPath Destination file path.
   */
  download(remoteKey: string, localPath: string): Promise<Result<string, PipelineError>>
}
