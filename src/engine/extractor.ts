import fs from "node:fs";
import path from "node:path";
import { encodeMp3 } from "../audio/ffmpeg";

/** The loaded model, as far as the extractor is concerned. */
export interface VocalSeparator {
  separateVocals(args: { inputPath: string; outputPath: string }): Promise<void>;
}

export type Mp3Encoder = (args: { inputPath: string; outputPath: string; bitrateKbps: number }) => Promise<void>;

export type VocalExtractorOptions = {
  ffmpegBin: string;
  bitrateKbps: number;
  encoder?: Mp3Encoder;
};

export type ExtractInput = {
  inputPath: string;
  workDir: string;
};

export class VocalExtractor {
  private readonly encode: Mp3Encoder;

  constructor(private readonly options: VocalExtractorOptions) {
    this.encode =
      options.encoder ??
      ((args) => encodeMp3({ ffmpegBin: options.ffmpegBin, ...args }));
  }

  /**
   * Separates the vocal stem of `inputPath` and returns it as MP3 bytes.
   * Intermediate files are written to `workDir`, which the caller removes.
   */
  async extract(model: VocalSeparator, input: ExtractInput): Promise<Buffer> {
    const wavPath = path.join(input.workDir, "vocals.wav");
    const mp3Path = path.join(input.workDir, "vocals.mp3");

    await model.separateVocals({ inputPath: input.inputPath, outputPath: wavPath });
    await this.encode({ inputPath: wavPath, outputPath: mp3Path, bitrateKbps: this.options.bitrateKbps });
    await fs.promises.rm(wavPath, { force: true });

    return fs.promises.readFile(mp3Path);
  }
}
