import { describe, expect, it } from 'vitest'

import { ConfigurationError, createStageStateView, PipelineState } from '../src/index.js'

const createState = (): PipelineState => {
  return new PipelineState(
    { BRANCH_NAME: 'main', SKIP_TESTS: true },
    { IMAGE_NAME: 'shop:1.0.0' },
    new Map([
      ['SCAN_STATUS', 'vulnerability-scan'],
      ['REPORT_URL', 'upload-report'],
    ])
  )
}

describe('PipelineState', () => {
  it('reads parameters, environment and committed outputs', () => {
    const state = createState()
    state.commit('vulnerability-scan', { SCAN_STATUS: 1 })

    expect(state.get('BRANCH_NAME')).toBe('main')
    expect(state.get('IMAGE_NAME')).toBe('shop:1.0.0')
    expect(state.get('SCAN_STATUS')).toBe(1)
    expect(state.has('REPORT_URL')).toBe(false)
    expect(() => state.require('REPORT_URL')).toThrow('State key REPORT_URL has no value')
  })

  it('rejects writes from a stage that does not own the key', () => {
    const state = createState()

    expect(() => state.commit('upload-report', { REPORT_URL: 'x', SCAN_STATUS: 0 })).toThrow(
      ConfigurationError
    )
    expect(state.snapshot().outputs).toEqual({})
  })

  it('exposes parameters, environment and requested outputs as command variables', () => {
    const state = createState()
    state.commit('vulnerability-scan', { SCAN_STATUS: 0 })

    expect(state.toCommandEnvironment(['SCAN_STATUS', 'REPORT_URL'])).toEqual({
      BRANCH_NAME: 'main',
      SKIP_TESTS: 'true',
      IMAGE_NAME: 'shop:1.0.0',
      SCAN_STATUS: '0',
    })
    expect(state.toCommandEnvironment([])).not.toHaveProperty('SCAN_STATUS')
  })
})

describe('createStageStateView', () => {
  it('limits reads to parameters, environment and declared outputs', () => {
    const state = createState()
    state.commit('vulnerability-scan', { SCAN_STATUS: 1 })

    const view = createStageStateView(state, 'push-image', new Set(['SCAN_STATUS']))

    expect(view.get('SCAN_STATUS')).toBe(1)
    expect(view.get('BRANCH_NAME')).toBe('main')
    expect(() => view.get('REPORT_URL')).toThrow('Stage push-image reads undeclared key REPORT_URL')
  })

  it('prefers values staged by the running attempt', () => {
    const state = createState()
    const staged = new Map([['REPORT_URL', 'https://reports.example.com/scan.html']])

    const view = createStageStateView(state, 'upload-report', new Set(['REPORT_URL']), staged)

    expect(view.require('REPORT_URL')).toBe('https://reports.example.com/scan.html')
  })

  it('names the stage when a required value is missing', () => {
    const view = createStageStateView(createState(), 'push-image', new Set(['SCAN_STATUS']))

    expect(() => view.require('SCAN_STATUS')).toThrow(
      'Stage push-image requires SCAN_STATUS, which has no value'
    )
  })
})
