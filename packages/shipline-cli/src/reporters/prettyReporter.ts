import type {
  PipelineReporter,
  PipelineRun,
  StageDefinition,
  StageResult,
} from '@shipline/core'

/**
 * Options for the pretty console reporter.
 */
export interface PrettyReporterOptions {
  /** Prints stage notes and retry counts also for successful stages. */
  readonly verbose: boolean
}

type Color = 'red' | 'green' | 'yellow' | 'blue'

/**
 * Compact console reporter with failure-focused detail output.
 */
export class PrettyReporter implements PipelineReporter {
  private readonly options: PrettyReporterOptions

  /**
   * Creates a pretty reporter.
   *
   * @param options Reporter options.
   */
  public constructor(options: PrettyReporterOptions) {
    this.options = options
  }

  /**
   * Handles pipeline start.
   *
   * @param stages Pipeline stages.
   */
  public onPipelineStart(stages: readonly StageDefinition[]): void {
    process.stdout.write(colorize(`shipline: executing ${stages.length} stages\n`, 'blue'))
  }

  /**
   * Handles stage start.
   *
   * @param stage Current stage.
   */
  public onStageStart(stage: StageDefinition): void {
    const group = stage.parallelGroup ? ` [${stage.parallelGroup}]` : ''
    process.stdout.write(colorize(`-> ${stage.name ?? stage.id}${group}\n`, 'blue'))
  }

  /**
   * Handles stage completion.
   *
   * @param result Stage result.
   */
  public onStageComplete(result: StageResult): void {
    const duration = `${result.durationMs}ms`
    const attempts = result.retried ? `, ${result.attempts} attempts` : ''

    if (result.status === 'success') {
      process.stdout.write(colorize(`✓ ${result.name} ${duration}${attempts}\n`, 'green'))
      if (this.options.verbose) {
        this.printDetails(result)
      }
      return
    }

    const reason = result.reason ?? 'no reason'

    if (result.status === 'skipped') {
      process.stdout.write(colorize(`ℹ ${result.name} skipped (${reason}, ${duration})\n`, 'yellow'))
      if (this.options.verbose || result.reason === 'failure_ignored') {
        this.printDetails(result)
      }
      return
    }

    if (result.status === 'unstable') {
      process.stdout.write(
        colorize(`⚠ ${result.name} unstable (${reason}, ${duration}${attempts})\n`, 'yellow')
      )
      this.printDetails(result)
      return
    }

    process.stdout.write(
      colorize(`✗ ${result.name} failure (${reason}, ${duration}${attempts})\n`, 'red')
    )
    this.printDetails(result)
  }

  /**
   * Handles pipeline completion.
   *
   * @param run Final run data.
   */
  public onPipelineComplete(run: PipelineRun): void {
    if (run.error) {
      process.stdout.write(colorize(`Configuration error: ${run.error.message}\n`, 'red'))
      return
    }

    const summary = run.summary
    process.stdout.write('\n')
    process.stdout.write(
      `Summary: total=${summary.total} succeeded=${summary.succeeded} unstable=${summary.unstable} skipped=${summary.skipped} failed=${summary.failed} duration=${summary.durationMs}ms\n`
    )

    for (const artifact of run.artifacts) {
      process.stdout.write(`Artifact: ${artifact.label} ${artifact.url}\n`)
    }

    if (run.status === 'success') {
      process.stdout.write(colorize('Result: ✅ SUCCESS\n', 'green'))
      return
    }

    if (run.status === 'unstable') {
      process.stdout.write(
        colorize(`Result: ⚠ UNSTABLE${run.exitCode === 0 ? '' : ' (failing)'}\n`, 'yellow')
      )
      return
    }

    process.stdout.write(colorize('Result: FAILURE\n', 'red'))
  }

  private printDetails(result: StageResult): void {
    if (result.message) {
      process.stdout.write(colorize('  note:\n', 'yellow'))
      process.stdout.write(indent(result.message))
      process.stdout.write('\n')
    }

    if (result.error) {
      process.stdout.write(colorize(`  ${result.error.name}:\n`, 'yellow'))
      process.stdout.write(indent(result.error.message))
      process.stdout.write('\n')
    }
  }
}

const indent = (text: string): string => {
  return text
    .split('\n')
    .map((line) => `    ${line}`)
    .join('\n')
}

const colorize = (text: string, color: Color): string => {
  const colors: Record<Color, string> = {
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
  }

  return `${colors[color]}${text}\x1b[0m`
}
