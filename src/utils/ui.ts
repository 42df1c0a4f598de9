import ora, { type Ora } from "ora";

let activeSpinner: Ora | null = null;

/** Start a spinner on stderr. Replaces any active spinner. */
export function startSpinner(text: string): void {
  activeSpinner?.stop();
  activeSpinner = ora({
    text,
    stream: process.stderr,
    // No animation when stderr is piped (CI, tests)
    isEnabled: process.stderr.isTTY === true,
  }).start();
}

export function updateSpinner(text: string): void {
  if (activeSpinner) {
    activeSpinner.text = text;
  }
}

export function stopSpinner(): void {
  activeSpinner?.stop();
  activeSpinner = null;
}

export function isSpinnerActive(): boolean {
  return activeSpinner !== null;
}

/** Temporarily stop the spinner so a log line can print. Returns the resume function. */
export function pauseSpinner(): (() => void) | null {
  if (!activeSpinner) return null;
  const spinner = activeSpinner;
  spinner.stop();
  return () => {
    spinner.start();
  };
}

const UNITS = ["B", "KiB", "MiB", "GiB"];

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${UNITS[unit]}` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

/** "label 1.5 MiB / 3.0 MiB (50%)", or just the byte count when the size is unknown */
export function progressText(label: string, received: number, total?: number): string {
  if (!total) return `${label} ${formatBytes(received)}`;
  const pct = Math.min(100, Math.floor((received / total) * 100));
  return `${label} ${formatBytes(received)} / ${formatBytes(total)} (${pct}%)`;
}
