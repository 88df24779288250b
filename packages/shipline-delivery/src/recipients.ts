import { ConfigurationError } from '@shipline/core'

/**
 * Resolves comma-separated user ids to mail addresses.
 *
 * @param userIdsCsv User ids, e.g. `alice, bob`.
 * @param directory Known addresses by user id.
 * @returns Distinct addresses in the order given.
 * @throws ConfigurationError listing every unknown id.
 */
export const resolveRecipients = (
  userIdsCsv: string,
  directory: Readonly<Record<string, string>>
): readonly string[] => {
  const userIds = userIdsCsv
    .split(',')
    .map((userId) => userId.trim())
    .filter((userId) => userId.length > 0)

  const addresses: string[] = []
  const unknown: string[] = []

  for (const userId of userIds) {
    const address = Object.hasOwn(directory, userId) ? directory[userId] : undefined
    if (address === undefined) {
      unknown.push(userId)
      continue
    }
    if (!addresses.includes(address)) {
      addresses.push(address)
    }
  }

  if (unknown.length > 0) {
    throw new ConfigurationError(
      `Invalid recipient ID: ${unknown.join(', ')}`,
      unknown.map((userId) => `recipient ${userId} is not a known user id`)
    )
  }

  return addresses
}
