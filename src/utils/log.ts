import fs from 'fs';
import cliProgress from 'cli-progress';

/**
 * Appends a message to a log file, or overwrites it when reset is set
 *
 * @param logFile - Path of the file to write
 * @param message - The message to log to the file
 * @param reset - If true, overwrites the file; if false, appends to the file
 */
export function logToFile(logFile: string, message: string, reset: boolean = false) {
  const stream = fs.createWriteStream(logFile, { flags: reset ? 'w' : 'a' });
  stream.write(message + '\n');
  stream.end();
}

let progressBar: cliProgress.SingleBar | null = null;

/**
 * Initializes a progress bar for a batch run
 *
 * @param total - Number of items the batch will process
 * @param label - Shown after the counter, e.g. the month being processed
 */
export function initProgressBar(total: number, label: string) {
  progressBar = new cliProgress.SingleBar({
    format: `Progress |{bar}| {percentage}% | {value} / {total} | ${label}`,
    barCompleteChar: '█',
    barIncompleteChar: '░',
  });
  progressBar.start(total, 0);
}

/**
 * Increments the progress bar by one step
 */
export function incrementProgressBar() {
  progressBar?.increment();
}

/**
 * Stops and cleans up the progress bar
 */
export function stopProgressBar() {
  progressBar?.stop();
  progressBar = null;
}
