import { describe, expect, it, vi } from 'vitest'

import type { NotificationMessage, RunReport } from '../src/index.js'
import {
  createChannelNotifier,
  createNoopNotifier,
  createPipelineRunner,
  definePipeline,
  fail,
  ok,
  renderRunReportHtml,
  renderSubject,
  succeed,
  ToolFailure,
} from '../src/index.js'

const report: RunReport = {
  job: { jobName: 'shop <main>', buildId: '42', buildUrl: 'https://ci.example.com/job/shop/42' },
  status: 'unstable',
  durationMs: 1500,
  stages: [
    { id: 'build', name: 'Build', status: 'success' },
    {
      id: 'secret-scan',
      name: 'Secret Scan',
      status: 'unstable',
      reason: 'reported_unstable',
      detail: '3 "generic-api-key" leaks',
    },
  ],
  links: [{ label: 'Scan report', url: 'https://reports.example.com/scan?build=42&format=html' }],
}

describe('renderSubject', () => {
  it('replaces known placeholders and keeps unknown ones', () => {
    expect(renderSubject('{{job}} #{{build}} {{status}} {{branch}}', report)).toBe(
      'shop <main> #42 UNSTABLE {{branch}}'
    )
  })
})

describe('renderRunReportHtml', () => {
  it('renders an escaped stage table with links', () => {
    expect(renderRunReportHtml(report)).toBe(
      [
        '<html><body>',
        '<h2>shop &lt;main&gt;: UNSTABLE</h2>',
        '<p>Build: <a href="https://ci.example.com/job/shop/42">42</a></p>',
        '<p>Duration: 1500ms</p>',
        '<table><tr><th>Stage</th><th>Status</th><th>Detail</th></tr>',
        '<tr><td>Build</td><td>SUCCESS</td><td></td></tr>',
        '<tr><td>Secret Scan</td><td>UNSTABLE</td><td>3 &quot;generic-api-key&quot; leaks</td></tr>',
        '</table>',
        '<ul><li><a href="https://reports.example.com/scan?build=42&amp;format=html">Scan report</a></li></ul>',
        '</body></html>',
      ].join('\n')
    )
  })

  it('shows an ignored failure as a failure rather than a skip', () => {
    const html = renderRunReportHtml({
      ...report,
      status: 'success',
      stages: [
        { id: 'build', name: 'Build', status: 'success' },
        {
          id: 'cleanup',
          name: 'Cleanup',
          status: 'skipped',
          reason: 'failure_ignored',
          detail: 'docker rmi exited with code 1',
        },
        { id: 'smoke', name: 'Smoke', status: 'skipped', reason: 'condition_not_met' },
      ],
    })

    expect(html.split('\n').filter((line) => line.startsWith('<tr><td>'))).toEqual([
      '<tr><td>Build</td><td>SUCCESS</td><td></td></tr>',
      '<tr><td>Cleanup</td><td>FAILURE (ignored)</td><td>docker rmi exited with code 1</td></tr>',
      '<tr><td>Smoke</td><td>SKIPPED</td><td></td></tr>',
    ])
  })
})

describe('createChannelNotifier', () => {
  it('sends one message per run with the configured subject and attachments', async () => {
    const messages: NotificationMessage[] = []
    const attachments = vi.fn(() => ['reports/trivy-report.html'])

    const notifier = createChannelNotifier({
      channel: {
        send: async (message) => {
          messages.push(message)
        },
      },
      to: ['dev@example.com', 'ops@example.com'],
      job: { jobName: 'shop', buildId: '7' },
      subjects: { failure: '[{{status}}] {{job}} #{{build}}' },
      attachments,
    })

    const pipeline = definePipeline('shop')
      .stage({ id: 'checkout', run: () => succeed() })
      .stage({ id: 'build', run: () => fail(new ToolFailure('mvn exited with code 1', 1)) })
      .build()

    const run = await createPipelineRunner({
      pipeline,
      adapter: async () => ok({ exitCode: 0, signal: null, stdout: '', stderr: '', durationMs: 1 }),
      notifier,
    }).run()

    expect(messages).toHaveLength(1)
    expect(messages[0]?.to).toEqual(['dev@example.com', 'ops@example.com'])
    expect(messages[0]?.subject).toBe('[FAILURE] shop #7')
    expect(messages[0]?.attachments).toEqual(['reports/trivy-report.html'])
    expect(messages[0]?.htmlBody).toContain(
      '<tr><td>build</td><td>FAILURE</td><td>mvn exited with code 1</td></tr>'
    )
    expect(attachments).toHaveBeenCalledWith(run)
  })

  it('falls back to the default subject', async () => {
    const send = vi.fn(async (): Promise<void> => undefined)

    const notifier = createChannelNotifier({
      channel: { send },
      to: ['dev@example.com'],
      job: { jobName: 'shop' },
    })

    await createPipelineRunner({
      pipeline: definePipeline('shop').stage({ id: 'build', run: () => succeed() }).build(),
      adapter: async () => ok({ exitCode: 0, signal: null, stdout: '', stderr: '', durationMs: 1 }),
      notifier,
    }).run()

    expect(send).toHaveBeenCalledWith(
      expect.objectContaining({ subject: 'shop: SUCCESS', attachments: [] })
    )
  })
})

describe('createNoopNotifier', () => {
  it('accepts a finished run and sends nothing', async () => {
    const run = await createPipelineRunner({
      pipeline: definePipeline('shop').stage({ id: 'build', run: () => succeed() }).build(),
      adapter: async () => ok({ exitCode: 0, signal: null, stdout: '', stderr: '', durationMs: 1 }),
      notifier: createNoopNotifier(),
    }).run()

    expect(run.status).toBe('success')
    expect(createNoopNotifier().notify(run)).toBeUndefined()
  })
})
