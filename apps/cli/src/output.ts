import type { DownloadProgress } from "@pyvm/updater";

export interface TextSink {
  write(text: string): unknown;
}

export interface ConsoleOutput {
  out: (line: string) => void;
  onProgress: (progress: DownloadProgress) => void;
}

export function formatProgress(progress: DownloadProgress): string {
  if (progress.percent !== null && progress.total !== null) {
    return `Downloading: ${progress.percent.toFixed(1)}% (${progress.downloaded}/${progress.total} bytes)`;
  }
  return `Downloading: ${progress.downloaded} bytes`;
}

/**
 * Line output plus an in-place progress line. The progress line is
 * terminated before the next regular line is written.
 */
export function createConsoleOutput(sink: TextSink = process.stdout): ConsoleOutput {
  let progressActive = false;

  return {
    out(line) {
      if (progressActive) {
        sink.write("\n");
        progressActive = false;
      }
      sink.write(`${line}\n`);
    },
    onProgress(progress) {
      sink.write(`\r${formatProgress(progress)}`);
      progressActive = true;
    },
  };
}
