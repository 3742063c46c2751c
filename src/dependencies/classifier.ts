import type { AgentRunner } from '../claude/agent-runner.js';
import type { OutcomeClass, Session } from '../session/types.js';

/**
 * Decides whether a finished session passed or failed. Conditional
 * dependencies depend on this judgement; the resolver never parses results
 * itself.
 */
export interface OutcomeClassifier {
  classify(session: Session): Promise<OutcomeClass>;
}

const MAX_RESULT_CHARS = 4000;

export function buildClassificationPrompt(task: string, result: string): string {
  const clipped = result.length > MAX_RESULT_CHARS ? `${result.slice(0, MAX_RESULT_CHARS)}\n[truncated]` : result;
  return `You are judging the outcome of a delegated task.

# Task
${task}

# Result
${clipped}

Did the task achieve its goal? Answer with exactly one word on the last line: PASS or FAIL.`;
}

/** Last PASS/FAIL token in the response, or null when there is none */
export function parseClassification(response: string): OutcomeClass | null {
  const lines = response.trim().split('\n').reverse();
  for (const line of lines) {
    const match = line.match(/\b(PASS|FAIL)\b/i);
    if (match) {
      return match[1].toUpperCase() === 'PASS' ? 'pass' : 'fail';
    }
  }
  return null;
}

/** Delegates classification to an agent in --print mode */
export class AgentOutcomeClassifier implements OutcomeClassifier {
  constructor(private runner: AgentRunner) {}

  async classify(session: Session): Promise<OutcomeClass> {
    const prompt = buildClassificationPrompt(session.task, session.result ?? '');
    const run = await this.runner.run(prompt, { label: `classify ${session.id}` });

    if (!run.success) {
      throw new Error(`Classifier exited with code ${run.exitCode}${run.timedOut ? ' (timed out)' : ''}: ${run.stderr}`);
    }

    const outcome = parseClassification(run.output);
    if (!outcome) {
      throw new Error(`Classifier gave no PASS/FAIL answer for session ${session.id}`);
    }
    return outcome;
  }
}
