import ora from 'ora';

export interface SpinnerOptions {
  /** Force the spinner on or off; by default it runs only on an interactive terminal */
  enabled?: boolean;
}

/**
 * Show a spinner while `task` runs. The spinner is stopped before the task's
 * result (or error) is handed back, so nothing it draws mixes with output
 * printed afterwards.
 */
export async function withSpinner<T>(
  message: string,
  task: () => Promise<T>,
  options: SpinnerOptions = {}
): Promise<T> {
  const spinner = ora({
    text: message,
    // A traced script may read stdin
    discardStdin: false,
    ...(options.enabled !== undefined ? { isEnabled: options.enabled } : {}),
  }).start();

  try {
    return await task();
  } finally {
    spinner.stop();
  }
}
