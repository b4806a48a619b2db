import { spawn } from "node:child_process";

export class EncodeError extends Error {
  public readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = "EncodeError";
    this.details = details;
  }
}

export function mp3EncodeArgs(inputPath: string, outputPath: string, bitrateKbps: number): string[] {
  return [
    "-hide_banner",
    "-nostdin",
    "-y",
    "-i",
    inputPath,
    "-map",
    "0:a:0",
    "-vn",
    "-c:a",
    "libmp3lame",
    "-b:a",
    `${bitrateKbps}k`,
    outputPath,
  ];
}

export async function encodeMp3(args: {
  ffmpegBin: string;
  inputPath: string;
  outputPath: string;
  bitrateKbps: number;
}): Promise<void> {
  const ffmpegArgs = mp3EncodeArgs(args.inputPath, args.outputPath, args.bitrateKbps);

  await new Promise<void>((resolve, reject) => {
    const child = spawn(args.ffmpegBin, ffmpegArgs, { stdio: ["ignore", "ignore", "pipe"] });
    let stderr = "";

    child.stderr.on("data", (d) => {
      stderr += String(d);
      if (stderr.length > 32_000) stderr = `${stderr.slice(0, 32_000)}…`;
    });

    child.on("error", (err) => reject(new EncodeError(`ffmpeg could not be started: ${err.message}`)));
    child.on("close", (code, signal) => {
      if (code === 0) return resolve();
      const msg = `ffmpeg failed code=${code ?? "null"} signal=${signal ?? "null"}`;
      reject(new EncodeError(msg, stderr.trim() || undefined));
    });
  });
}
