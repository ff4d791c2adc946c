/**
 * Wraps catalogue variants into complete URScript programs. A program optionally reports back to
 * the completion socket server once its last statement has run, which is how the executor knows
 * the motion has finished.
 */
import type { JobDefinition, JobVariant } from './jobCatalog';

/** Where the robot should report completion. */
export interface CompletionCallbackConfig {
  host: string;
  port: number;
}

export interface JobProgramOptions {
  /** Identifier echoed back by the robot in its completion report. */
  runId: string;
  /** `null` skips the completion report entirely. */
  completion: CompletionCallbackConfig | null;
}

export interface JobProgramResult {
  /** Fully formatted URScript program ready for streaming. */
  program: string;
  metadata: {
    /** Name of the URScript function defined by the program. */
    functionName: string;
    jobIndex: number;
    slot: number;
    variantLabel: string;
    /** Number of catalogue statements embedded in the program. */
    statementCount: number;
    reportsCompletion: boolean;
  };
}

const INDENT = '    ';

/** URScript string literals cannot contain raw double quotes. */
const sanitizeMessage = (value: string) => value.replace(/"/g, "'");

/** The line the robot sends when a run finishes; parsed by `parseCompletionLine`. */
export const formatCompletionLine = (runId: string) => `done ${runId}`;

export function buildJobProgram(
  job: JobDefinition,
  slot: number,
  variant: JobVariant,
  options: JobProgramOptions,
): JobProgramResult {
  const functionName = `job_${job.index}_slot_${slot}`;
  const message = sanitizeMessage(`${job.name} / ${variant.label}`);

  const lines: string[] = [];
  lines.push(`def ${functionName}():`);
  lines.push(`${INDENT}textmsg("Starting ${message}")`);
  for (const statement of variant.script) {
    lines.push(`${INDENT}${statement.trim()}`);
  }

  if (options.completion) {
    lines.push(`${INDENT}global completion_open = socket_open("${options.completion.host}", ${options.completion.port}, "completion")`);
    lines.push(`${INDENT}while (completion_open == False):`);
    lines.push(`${INDENT}${INDENT}sleep(0.5)`);
    lines.push(`${INDENT}${INDENT}completion_open = socket_open("${options.completion.host}", ${options.completion.port}, "completion")`);
    lines.push(`${INDENT}end`);
    lines.push(`${INDENT}socket_send_line("${formatCompletionLine(options.runId)}", "completion")`);
    lines.push(`${INDENT}socket_close("completion")`);
  }

  lines.push(`${INDENT}textmsg("Finished ${message}")`);
  lines.push('end');
  lines.push(`${functionName}()`);

  return {
    program: lines.join('\n'),
    metadata: {
      functionName,
      jobIndex: job.index,
      slot,
      variantLabel: variant.label,
      statementCount: variant.script.length,
      reportsCompletion: options.completion !== null,
    },
  };
}
