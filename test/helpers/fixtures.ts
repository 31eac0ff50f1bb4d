import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

export const MAIN_FIXTURE = fileURLToPath(new URL("../fixtures/main_results.txt", import.meta.url));
export const CURRENT_FIXTURE = fileURLToPath(new URL("../fixtures/current_results.txt", import.meta.url));

export function writeTempFile(name: string, content: string): string {
  const dir = mkdtempSync(join(tmpdir(), "benchdiff-"));
  const path = join(dir, name);
  writeFileSync(path, content);
  return path;
}

export interface CapturedIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  out: () => string;
  err: () => string;
}

export function captureIo(): CapturedIo {
  let out = "";
  let err = "";
  return {
    stdout: (text) => {
      out += text;
    },
    stderr: (text) => {
      err += text;
    },
    out: () => out,
    err: () => err,
  };
}
