/**
 * Contract composition - the document a worker receives when it starts.
 *
 * Sections always appear in the same order:
 *   File Scope, Parent Intent, Phase, Prior Results, Task,
 *   then Feedback From Verification and Verification when present.
 */

import { MissingDependencyResultError } from '../errors/index.js';
import type { SessionStore } from '../session/store.js';
import type { CheckerSpec, PhaseMetadata, Session, VerdictRecord } from '../session/types.js';

export interface PipedResult {
  sessionId: string;
  result: string;
}

export interface ContractInput {
  task: string;
  pipedResults?: PipedResult[];
  phase?: PhaseMetadata | null;
  parentIntent?: string | null;
  fileScope?: string[];
  /** Checker findings from the previous iteration */
  findings?: string | null;
  /** Iteration about to run, 1-based */
  iteration?: number;
  checker?: CheckerSpec | null;
}

export function composeContract(input: ContractInput): string {
  const sections: string[] = [];

  if (input.fileScope && input.fileScope.length > 0) {
    const constraints = input.fileScope.map((path) => `- \`${path}\``).join('\n');
    sections.push(`# File Scope\n\nOnly modify files within the following paths:\n${constraints}`);
  }

  if (input.parentIntent) {
    sections.push(`# Parent Intent\n\n${input.parentIntent}`);
  }

  if (input.phase) {
    let phase = `# Phase\n\nYou are in the **${input.phase.name}** phase.`;
    if (input.phase.previousOutput) {
      phase += `\n\nThe previous phase produced:\n\n${input.phase.previousOutput}`;
    }
    sections.push(phase);
  }

  if (input.pipedResults && input.pipedResults.length > 0) {
    const body = input.pipedResults
      .map((piped) => `The previous session [${piped.sessionId}] produced:\n\n${piped.result}`)
      .join('\n\n---\n\n');
    sections.push(`# Prior Results\n\n${body}`);
  }

  sections.push(`# Task\n\n${input.task}`);

  if (input.findings) {
    const previous = (input.iteration ?? 2) - 1;
    sections.push(
      `# Feedback From Verification\n\n` +
        `Iteration ${previous} was rejected by the checker. Address these findings:\n\n${input.findings}`
    );
  }

  if (input.checker) {
    const how =
      input.checker.kind === 'command'
        ? `Your work will be verified by running:\n\`\`\`bash\n${input.checker.command}\n\`\`\``
        : `Your output will be reviewed against these criteria:\n${input.checker.prompt}`;
    sections.push(`# Verification\n\n${how}`);
  }

  return sections.join('\n\n');
}

/**
 * Prompt for an agent checker. The checker sees the doer's output (not its
 * reasoning), the iteration number and earlier verdicts.
 */
export function composeCheckerContract(
  criteria: string,
  doerOutput: string,
  iteration: number,
  history: VerdictRecord[] = []
): string {
  const sections: string[] = [];

  sections.push(
    '# Role\n\n' +
      "You are a **checker**. Verify the doer's output and render a verdict.\n\n" +
      'End your response with exactly one of these verdicts on its own line:\n' +
      '- `ACCEPT` - the output meets the criteria\n' +
      '- `RETRY` - the output needs improvement (give specific feedback)\n' +
      "- `TERMINATE` - the task is fundamentally broken and retrying won't help"
  );
  sections.push(`# Checker Criteria\n\n${criteria}`);
  sections.push(`# Doer Output\n\n${doerOutput}`);
  sections.push(`# Iteration\n\nThis is iteration ${iteration}.`);

  if (history.length > 0) {
    const lines = history.map((entry) => {
      const line = `- Iteration ${entry.iteration}: **${entry.verdict}**`;
      return entry.findings ? `${line} - ${entry.findings}` : line;
    });
    sections.push(`# Prior Iterations\n\n${lines.join('\n')}`);
  }

  return sections.join('\n\n');
}

/**
 * Reads the already-resolved results a session pipes in and composes its
 * contract. Performs no I/O beyond those reads.
 */
export class ContractComposer {
  constructor(private store: SessionStore) {}

  async composeFor(session: Session): Promise<string> {
    const pipedResults = await this.collectPipedResults(session);
    return composeContract({
      task: session.task,
      pipedResults,
      phase: session.phase,
      parentIntent: session.parentIntent,
      fileScope: session.fileScope,
      findings: session.findings,
      iteration: session.iterationCount + 1,
      checker: session.checker,
    });
  }

  /**
   * Results of the predecessors the resolver selected. An empty selection is
   * valid: a tolerant all-of rule whose predecessors all failed pipes nothing.
   */
  async collectPipedResults(session: Session): Promise<PipedResult[]> {
    const results: PipedResult[] = [];
    for (const predecessorId of session.pipedInputs) {
      const predecessor = await this.store.get(predecessorId);
      if (predecessor.result === null) {
        throw new MissingDependencyResultError(session.id, predecessorId);
      }
      results.push({ sessionId: predecessorId, result: predecessor.result });
    }
    return results;
  }
}
