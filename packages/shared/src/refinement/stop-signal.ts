/**
 * Stop Signals
 *
 * The refinement loop never decides to stop on its own. After every
 * iteration it asks a StopSignal: an iteration budget, an operator at the
 * terminal, or both.
 */

import readline from 'readline';
import type { PromptState } from '../types';

export interface StopSignal {
  shouldStop(state: PromptState): Promise<boolean>;
}

/**
 * Stops once `budget` iterations have completed in this run.
 */
export class IterationBudget implements StopSignal {
  constructor(private readonly budget: number) {}

  async shouldStop(state: PromptState): Promise<boolean> {
    return state.history.length >= this.budget;
  }
}

export interface InteractiveStopSignalOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Asks the operator whether to run another iteration. Anything but an
 * answer starting with "y" stops the loop.
 */
export class InteractiveStopSignal implements StopSignal {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;

  constructor(options: InteractiveStopSignalOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  async shouldStop(state: PromptState): Promise<boolean> {
    const rl = readline.createInterface({ input: this.input, output: this.output });
    const last = state.history[state.history.length - 1];
    const accuracy = last?.metrics.accuracy;
    const summary =
      accuracy === undefined || accuracy === null ? '' : ` (accuracy ${accuracy.toFixed(3)})`;

    try {
      const answer = await new Promise<string>((resolve) => {
        rl.question(
          `Iteration ${state.iteration} of ${state.parameterName} done${summary}. Run another? [y/N] `,
          resolve
        );
        rl.once('close', () => resolve(''));
      });
      return !answer.trim().toLowerCase().startsWith('y');
    } finally {
      rl.close();
    }
  }
}

/**
 * Stops as soon as any signal says so; later signals are not asked.
 */
export class AnyStopSignal implements StopSignal {
  private readonly signals: StopSignal[];

  constructor(...signals: StopSignal[]) {
    this.signals = signals;
  }

  async shouldStop(state: PromptState): Promise<boolean> {
    for (const signal of this.signals) {
      if (await signal.shouldStop(state)) {
        return true;
      }
    }
    return false;
  }
}
