import fs from "node:fs";
import path from "node:path";

/**
 * Prefers an explicit PYTHON_BIN, then the repo-local virtualenv, then
 * whatever `python3` resolves to on PATH.
 */
export function resolvePythonBin(configured: string, cwd = process.cwd()): string {
  if (configured) {
    const looksLikePath = configured.includes("/") || configured.includes("\\");
    if (looksLikePath && !fs.existsSync(configured)) {
      throw new Error(`PYTHON_BIN points to a missing file: ${configured}`);
    }
    return configured;
  }

  const venvPython =
    process.platform === "win32"
      ? path.join(cwd, ".venv", "Scripts", "python.exe")
      : path.join(cwd, ".venv", "bin", "python");

  if (fs.existsSync(venvPython)) return venvPython;
  return process.platform === "win32" ? "python" : "python3";
}
