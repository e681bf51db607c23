/**
 * Download Engine Contract
 * What the orchestrator needs from the external extractor.
 */

import type { TaskResult } from "./task.js";

export type EngineProgressStatus = "downloading" | "finished" | "error";

/** Progress counters as the engine reports them. Unknown values are left out. */
export interface EngineProgressEvent {
  status: EngineProgressStatus;
  downloadedBytes?: number;
  totalBytes?: number;
  totalBytesEstimate?: number;
  speed?: number;
  eta?: number;
  filename?: string;
  fragmentIndex?: number;
  fragmentCount?: number;
  /** How many streams the selected format downloads, when the engine knows. */
  streamCount?: number;
}

export type ProgressListener = (event: EngineProgressEvent) => void;

/** Credentials after preparation: only what yt-dlp reads. */
export interface EngineCredentials {
  cookieFile?: string;
  cookiesFromBrowser?: string;
}

export interface EngineDownloadRequest {
  url: string;
  outputPath: string;
  format: string;
  credentials?: EngineCredentials;
}

export interface VideoFormat {
  formatId: string;
  ext: string | null;
  resolution: string | null;
  fps: number | null;
  vcodec: string | null;
  acodec: string | null;
  filesizeBytes: number | null;
  tbr: number | null;
  note: string | null;
}

export interface VideoInfo {
  id: string | null;
  title: string | null;
  extractor: string | null;
  webpageUrl: string | null;
  durationSeconds: number | null;
  uploader: string | null;
  thumbnail: string | null;
  description: string | null;
  formats: VideoFormat[];
}

export interface DownloadEngine {
  download(request: EngineDownloadRequest, onProgress: ProgressListener): Promise<TaskResult>;
  getInfo(url: string, credentials?: EngineCredentials): Promise<VideoInfo>;
}
