/**
 * Cloud Billing — Progress Reporting
 *
 * Single stderr line while an asynchronous report is polled, redrawn after
 * every status check.
 */

export type PollProgressState = {
  attempts: number;
  status: string;
};

export type PollProgress = {
  /** Redraw the line for the latest status check. */
  update: (state: Readonly<PollProgressState>) => void;
  /** End the line. Safe to call more than once. */
  done: () => void;
};

export type PollProgressOptions = {
  silent?: boolean;
  stream?: { write: (chunk: string) => unknown };
};

export function formatPollLine(label: string, state: Readonly<PollProgressState>, maxChecks: number): string {
  return `${label}: check ${state.attempts}/${maxChecks} (${state.status})`;
}

/**
 * Nothing is drawn until the first check, so errors raised before polling
 * starts land on a clean line.
 */
export function createPollProgress(label: string, maxChecks: number, options: PollProgressOptions = {}): PollProgress {
  const stream = options.stream ?? process.stderr;
  let width = 0;
  let finished = false;

  return {
    update(state) {
      if (options.silent || finished) return;
      const line = `  ${formatPollLine(label, state, maxChecks)}`;
      stream.write(`\r${line.padEnd(width)}`);
      width = Math.max(width, line.length);
    },
    done() {
      if (finished) return;
      finished = true;
      if (width > 0) stream.write("\n");
    },
  };
}

/** Progress for a provider's cost report, one update per status check. */
export function createReportPollProgress(provider: string, maxChecks: number, silent = false): PollProgress {
  return createPollProgress(`Waiting for ${provider} cost report`, maxChecks, { silent });
}
