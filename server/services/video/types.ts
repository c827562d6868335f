/**
 * Video processing: Type Definitions
 *
 * Capability interfaces for the external media tools, so the ingest pipeline
 * can be exercised with deterministic fakes.
 */

export type AspectRatioClass = "landscape" | "portrait" | "other";

export interface ProbeStream {
  width?: number;
  height?: number;
  codec_type?: string;
}

export interface ProbeOutput {
  streams: ProbeStream[];
}

export interface ToolOptions {
  /** Aborts the external process when the request goes away */
  signal?: AbortSignal;
}

export interface MediaInspector {
  inspect(inputPath: string, options?: ToolOptions): Promise<ProbeOutput>;
}

export interface MediaRewriter {
  /** Returns the path of the rewritten file, a sibling of the input. */
  rewriteForFastStart(inputPath: string, options?: ToolOptions): Promise<string>;
}
