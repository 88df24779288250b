import type { ArtifactLink } from '../contracts/artifacts.js'
import type { PipelineRun, PipelineStatus } from '../contracts/run.js'
import type { StageStatus } from '../contracts/stage.js'

/**
 * Identity of the job a run belongs to.
 */
export interface JobIdentity {
  /** Job or pipeline name. */
  readonly jobName: string
  /** Build number or run id. */
  readonly buildId?: string
  /** Link to the run in the CI server. */
  readonly buildUrl?: string
}

/**
 * One stage line in a run report.
 */
export interface RunReportStage {
  readonly id: string
  readonly name: string
  readonly status: StageStatus
  readonly reason?: string
  /** Failure message from the deepest collaborator call, or the stage note. */
  readonly detail?: string
}

/**
 * Fixed set of fields sent in a run notification.
 */
export interface RunReport {
  readonly job: JobIdentity
  readonly status: PipelineStatus
  readonly durationMs: number
  readonly stages: readonly RunReportStage[]
  readonly links: readonly ArtifactLink[]
}

/**
 * Builds the report fields for a finished run.
 *
 * @param run Final run data.
 * @param job Job identity.
 * @param extraLinks Links added next to the artifacts published by stages.
 */
export const buildRunReport = (
  run: PipelineRun,
  job: JobIdentity,
  extraLinks: readonly ArtifactLink[] = []
): RunReport => {
  return {
    job,
    status: run.status,
    durationMs: run.summary.durationMs,
    stages: run.stages.map((stage) => ({
      id: stage.id,
      name: stage.name,
      status: stage.status,
      reason: stage.reason,
      detail: stage.error?.message ?? stage.message,
    })),
    links: [...run.artifacts, ...extraLinks],
  }
}

/**
 * Replaces `{{job}}`, `{{build}}` and `{{status}}` placeholders.
 *
 * @param template Subject template.
 * @param report Run report.
 */
export const renderSubject = (template: string, report: RunReport): string => {
  const values: Record<string, string> = {
    job: report.job.jobName,
    build: report.job.buildId ?? '',
    status: report.status.toUpperCase(),
  }

  return template.replace(/\{\{(\w+)\}\}/gu, (placeholder, key: string) => values[key] ?? placeholder)
}

/** Ignored failures are recorded as skipped but still show as failures. */
const stageStatusLabel = (stage: RunReportStage): string => {
  return stage.reason === 'failure_ignored' ? 'FAILURE (ignored)' : stage.status.toUpperCase()
}

/**
 * Renders a run report as an HTML document body.
 *
 * @param report Run report.
 */
export const renderRunReportHtml = (report: RunReport): string => {
  const rows = report.stages.map((stage) => {
    const detail = stage.detail ? escapeHtml(stage.detail) : ''
    return `<tr><td>${escapeHtml(stage.name)}</td><td>${stageStatusLabel(stage)}</td><td>${detail}</td></tr>`
  })

  const links = report.links.map(
    (link) => `<li><a href="${escapeHtml(link.url)}">${escapeHtml(link.label)}</a></li>`
  )

  const buildLine = report.job.buildUrl
    ? `<p>Build: <a href="${escapeHtml(report.job.buildUrl)}">${escapeHtml(report.job.buildId ?? report.job.buildUrl)}</a></p>`
    : ''

  return [
    '<html><body>',
    `<h2>${escapeHtml(report.job.jobName)}: ${report.status.toUpperCase()}</h2>`,
    buildLine,
    `<p>Duration: ${report.durationMs}ms</p>`,
    '<table><tr><th>Stage</th><th>Status</th><th>Detail</th></tr>',
    ...rows,
    '</table>',
    links.length > 0 ? `<ul>${links.join('')}</ul>` : '',
    '</body></html>',
  ]
    .filter((line) => line.length > 0)
    .join('\n')
}

const escapeHtml = (text: string): string => {
  return text
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&#39;')
}
