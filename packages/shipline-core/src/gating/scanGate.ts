/**
 * Verdict of a vulnerability scan, derived from the scanner's exit code.
 */
export type ScanVerdict = 'clean' | 'findings' | 'error'

/**
 * Scan result carrying the original exit code.
 */
export interface ScanStatus {
  readonly verdict: ScanVerdict
  readonly code: number
}

const SEVERITY_ORDER = ['UNKNOWN', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL']

/**
 * Maps a scanner exit code to a verdict: 0 clean, 1 findings, anything else error.
 *
 * @param exitCode Scanner exit code, null when the process ended by signal.
 */
export const scanStatusFromExitCode = (exitCode: number | null): ScanStatus => {
  if (exitCode === 0) {
    return { verdict: 'clean', code: 0 }
  }

  if (exitCode === 1) {
    return { verdict: 'findings', code: 1 }
  }

  return { verdict: 'error', code: exitCode ?? -1 }
}

/**
 * Normalizes a comma separated severity filter: trimmed, upper-cased,
 * de-duplicated and sorted by severity.
 *
 * @param filter Filter such as `medium, LOW`.
 * @returns Canonical form such as `LOW,MEDIUM`.
 */
export const normalizeSeverityFilter = (filter: string): string => {
  const severities = [
    ...new Set(
      filter
        .split(',')
        .map((severity) => severity.trim().toUpperCase())
        .filter((severity) => severity.length > 0)
    ),
  ]

  return severities
    .sort((left, right) => severityRank(left) - severityRank(right) || left.localeCompare(right))
    .join(',')
}

/**
 * Checks whether a severity filter belongs to the tolerated set.
 *
 * @param severityFilter Configured scan filter.
 * @param toleratedFilters Filters under which findings do not block publishing.
 */
export const isToleratedFilter = (
  severityFilter: string,
  toleratedFilters: readonly string[]
): boolean => {
  const normalized = normalizeSeverityFilter(severityFilter)
  if (normalized.length === 0) {
    return false
  }

  return toleratedFilters.some((filter) => normalizeSeverityFilter(filter) === normalized)
}

/**
 * Decides whether a publish-type stage may run after a scan.
 *
 * `status == 0 || (status == 1 && tolerated(severityFilter))`. Any other
 * status blocks regardless of configuration.
 *
 * @param status Scan status or raw exit code.
 * @param severityFilter Filter the scan ran with.
 * @param toleratedFilters Tolerated filters.
 */
export const canProceed = (
  status: ScanStatus | number,
  severityFilter: string,
  toleratedFilters: readonly string[]
): boolean => {
  const scanStatus = typeof status === 'number' ? scanStatusFromExitCode(status) : status

  if (scanStatus.verdict === 'clean') {
    return true
  }

  return scanStatus.verdict === 'findings' && isToleratedFilter(severityFilter, toleratedFilters)
}

const severityRank = (severity: string): number => {
  const index = SEVERITY_ORDER.indexOf(severity)
  return index === -1 ? SEVERITY_ORDER.length : index
}
