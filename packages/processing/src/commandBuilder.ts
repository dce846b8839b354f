/**
 * FFmpeg Command Builder
 *
 * Fluent API for building the transcoder invocations of a conversion:
 * segmenting, per-chunk projection transform and concatenation.
 *
 * CRITICAL: Prefer stream copy over encoding when possible!
 */

export interface InputOptions {
  format?: string;        // -f format
  extraArgs?: string[];   // Additional input args
}

export interface OutputOptions {
  format?: string;        // -f format
  extraArgs?: string[];   // Additional output args
}

export interface StreamMapping {
  inputIndex: number;
  streamSpec?: string;    // e.g., 'v'; all streams when omitted
}

export interface VideoCodecOptions {
  codec: 'libx265';
  crf?: number;
  pixFmt?: string;
}

export class FFmpegCommandBuilder {
  private inputs: { file: string; options: InputOptions }[] = [];
  private mappings: StreamMapping[] = [];
  private streamCopy = false;
  private videoCodec: VideoCodecOptions | null = null;
  private videoFilters: string[] = [];
  private outputOpts: OutputOptions = {};
  private outputFile: string = '';

  /**
   * Add input file
   */
  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec?: string): this {
    this.mappings.push({ inputIndex, streamSpec });
    return this;
  }

  /**
   * Map every stream of an input
   */
  mapAll(inputIndex: number = 0): this {
    return this.map(inputIndex);
  }

  /**
   * Map all video streams from input
   */
  mapVideo(inputIndex: number = 0): this {
    return this.map(inputIndex, 'v');
  }

  /**
   * Copy every mapped stream without re-encoding (-c copy)
   */
  copyAllStreams(): this {
    this.streamCopy = true;
    return this;
  }

  /**
   * Re-encode the video stream
   */
  setVideoCodec(options: VideoCodecOptions): this {
    this.videoCodec = options;
    return this;
  }

  /**
   * Add video filter
   */
  addVideoFilter(filter: string): this {
    this.videoFilters.push(filter);
    return this;
  }

  /**
   * Set output options
   */
  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  /**
   * Set output file
   */
  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    // Inputs
    for (const input of this.inputs) {
      if (input.options.format) {
        args.push('-f', input.options.format);
      }
      if (input.options.extraArgs) {
        args.push(...input.options.extraArgs);
      }
      args.push('-i', input.file);
    }

    // Mappings
    for (const mapping of this.mappings) {
      const spec = mapping.streamSpec ? `:${mapping.streamSpec}` : '';
      args.push('-map', `${mapping.inputIndex}${spec}`);
    }

    if (this.streamCopy) {
      args.push('-c', 'copy');
    }

    // Video codec
    if (this.videoCodec) {
      args.push('-c:v', this.videoCodec.codec);
      if (this.videoCodec.crf !== undefined) args.push('-crf', this.videoCodec.crf.toString());
      if (this.videoCodec.pixFmt) args.push('-pix_fmt', this.videoCodec.pixFmt);
    }

    // Filters need a re-encode
    if (this.videoFilters.length > 0) {
      if (this.streamCopy || !this.videoCodec) {
        throw new Error('Video filters require a video codec, not stream copy');
      }
      args.push('-vf', this.videoFilters.join(','));
    }

    // Output options
    if (this.outputOpts.format) {
      args.push('-f', this.outputOpts.format);
    }
    if (this.outputOpts.extraArgs) {
      args.push(...this.outputOpts.extraArgs);
    }

    // Output file
    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }
}

export function formatCommand(binary: string, args: readonly string[]): string {
  return `${binary} ${args.map(a => a.includes(' ') ? `"${a}"` : a).join(' ')}`;
}
