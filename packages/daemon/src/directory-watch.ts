import { watch } from "chokidar";
import { basename } from "node:path";
import { logDebug } from "./log.js";

export interface DirectoryWatch {
  close(): Promise<void>;
}

/**
 * Subscribe to approximate change events for the files directly inside
 * `directory`. `onChange` receives the base name of the file that changed.
 */
export type DirectoryWatchFactory = (
  directory: string,
  onChange: (filename: string) => void,
) => DirectoryWatch;

export const watchDirectory: DirectoryWatchFactory = (directory, onChange) => {
  const watcher = watch(directory, {
    persistent: true,
    ignoreInitial: true,
    depth: 0,
  });

  watcher
    .on("add", (path) => onChange(basename(path)))
    .on("change", (path) => onChange(basename(path)))
    .on("unlink", (path) => onChange(basename(path)))
    .on("error", (error) => {
      // The poll timer keeps things going; a broken watch only costs latency
      logDebug("DirectoryWatch", `Watch error on ${directory}: ${String(error)}`);
    });

  return {
    close: () => watcher.close(),
  };
};
