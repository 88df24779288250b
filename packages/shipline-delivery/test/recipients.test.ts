import { describe, expect, it } from 'vitest'

import { ConfigurationError } from '@shipline/core'

import { resolveRecipients } from '../src/recipients.js'

const directory = {
  alice: 'alice@example.com',
  bob: 'bob@example.com',
  ops: 'alice@example.com',
}

describe('resolveRecipients', () => {
  it('maps ids to distinct addresses in order', () => {
    expect(resolveRecipients(' bob, alice ,ops,, bob', directory)).toEqual([
      'bob@example.com',
      'alice@example.com',
    ])
  })

  it('returns nothing for an empty list', () => {
    expect(resolveRecipients('', directory)).toEqual([])
  })

  it('lists every unknown id', () => {
    let thrown: unknown
    try {
      resolveRecipients('alice,mallory,toString', directory)
    } catch (error: unknown) {
      thrown = error
    }

    expect(thrown).toBeInstanceOf(ConfigurationError)
    if (thrown instanceof ConfigurationError) {
      expect(thrown.message).toBe('Invalid recipient ID: mallory, toString')
      expect(thrown.issues).toEqual([
        'recipient mallory is not a known user id',
        'recipient toString is not a known user id',
      ])
    }
  })
})
