/**
 * Facade: one call hides a conversion pipeline of several subsystems.
 */

export class VideoFile {
  constructor(readonly name: string) {}

  get codec(): string {
    return this.name.split(".").pop() ?? "";
  }

  get baseName(): string {
    return this.name.replace(/\.[^.]+$/, "");
  }
}

export class CodecFactory {
  static extract(file: VideoFile): string {
    return file.codec === "ogg" ? "theora" : file.codec;
  }

  static target(format: string): string {
    return format === "mp4" ? "mpeg4" : format;
  }
}

export class BitrateReader {
  read(file: VideoFile, codec: string): number {
    return codec === "theora" && file.name.length > 0 ? 128 : 96;
  }
}

export class AudioMixer {
  fix(bitrate: number): string {
    return bitrate >= 128 ? "normalized audio" : "original audio";
  }
}

export class VideoConverter {
  convert(fileName: string, format: string): string {
    const file = new VideoFile(fileName);
    const sourceCodec = CodecFactory.extract(file);
    const targetCodec = CodecFactory.target(format);
    const bitrate = new BitrateReader().read(file, sourceCodec);
    const audio = new AudioMixer().fix(bitrate);
    return `Converted ${file.name} to ${file.baseName}.${format} using ${targetCodec} at ${bitrate}kbps with ${audio}`;
  }
}

export function demo(print: (line: string) => void): void {
  print(new VideoConverter().convert("holiday.ogg", "mp4"));
}
