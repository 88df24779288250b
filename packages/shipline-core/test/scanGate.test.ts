import { describe, expect, it } from 'vitest'

import {
  canProceed,
  isToleratedFilter,
  normalizeSeverityFilter,
  scanStatusFromExitCode,
} from '../src/index.js'

describe('scanStatusFromExitCode', () => {
  it('maps exit codes to verdicts', () => {
    expect(scanStatusFromExitCode(0)).toEqual({ verdict: 'clean', code: 0 })
    expect(scanStatusFromExitCode(1)).toEqual({ verdict: 'findings', code: 1 })
    expect(scanStatusFromExitCode(2)).toEqual({ verdict: 'error', code: 2 })
    expect(scanStatusFromExitCode(null)).toEqual({ verdict: 'error', code: -1 })
  })
})

describe('normalizeSeverityFilter', () => {
  it('trims, upper-cases, de-duplicates and sorts by severity', () => {
    expect(normalizeSeverityFilter(' critical, high ,HIGH')).toBe('HIGH,CRITICAL')
    expect(normalizeSeverityFilter('medium,LOW,unknown')).toBe('UNKNOWN,LOW,MEDIUM')
  })

  it('places unrecognized severities last', () => {
    expect(normalizeSeverityFilter('SEVERE,low')).toBe('LOW,SEVERE')
  })

  it('drops empty entries', () => {
    expect(normalizeSeverityFilter(' , ')).toBe('')
  })
})

describe('isToleratedFilter', () => {
  it('matches filters after normalization', () => {
    expect(isToleratedFilter('critical,high', ['HIGH,CRITICAL'])).toBe(true)
    expect(isToleratedFilter('CRITICAL', ['HIGH,CRITICAL'])).toBe(false)
  })

  it('never tolerates an empty filter', () => {
    expect(isToleratedFilter('', [''])).toBe(false)
  })
})

describe('canProceed', () => {
  const table = [
    { status: 0, tolerated: true, expected: true },
    { status: 0, tolerated: false, expected: true },
    { status: 1, tolerated: true, expected: true },
    { status: 1, tolerated: false, expected: false },
    { status: 2, tolerated: true, expected: false },
    { status: 2, tolerated: false, expected: false },
    { status: 3, tolerated: true, expected: false },
    { status: 3, tolerated: false, expected: false },
  ]

  it.each(table)(
    'returns $expected for status $status when tolerated is $tolerated',
    ({ status, tolerated, expected }) => {
      const toleratedFilters = tolerated ? ['HIGH,CRITICAL'] : ['CRITICAL']

      expect(canProceed(status, 'HIGH,CRITICAL', toleratedFilters)).toBe(expected)
      expect(canProceed(scanStatusFromExitCode(status), 'HIGH,CRITICAL', toleratedFilters)).toBe(
        expected
      )
    }
  )
})
