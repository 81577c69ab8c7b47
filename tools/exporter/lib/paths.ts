import { basename, extname, join } from "path";

export function inputBaseName(inputPath: string): string {
  const name = basename(inputPath);
  return name.slice(0, name.length - extname(name).length) || name;
}

/** Local-time stamp in the `YYYYMMDD-HHMMSS` form used for run folders. */
export function folderTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** Local-time stamp in the `YYYY-MM-DD HH:MM:SS` form used inside reports. */
export function displayTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    ` ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export interface RunOutputPaths {
  outputDir: string;
  documentPath: string;
  logPath: string;
}

export function runOutputPaths(outputRoot: string, inputPath: string, startedAt: Date): RunOutputPaths {
  const base = inputBaseName(inputPath);
  const outputDir = join(outputRoot, `${folderTimestamp(startedAt)}-${base}`);
  return {
    outputDir,
    documentPath: join(outputDir, `${base}-full_text_output.txt`),
    logPath: join(outputDir, `${base}-log.txt`),
  };
}
