export interface AnalysisImage {
  /** Local path of the screenshot */
  path: string;
  mimeType: "image/jpeg" | "image/png";
  /** Seconds into the video */
  timestamp: number;
}

export interface AnalysisRequest {
  /** System instruction */
  system: string;
  /** User prompt */
  prompt: string;
  images: AnalysisImage[];
  /** Max tokens for the response */
  maxTokens: number;
}

/**
 * External content-analysis model: text and images in, (ideally) JSON text out.
 */
export interface ContentAnalyzer {
  readonly name: string;
  readonly model: string;
  complete(req: AnalysisRequest): Promise<string>;
}
