/**
 * yt-dlp Download Engine
 * Runs the yt-dlp binary (YTDLP_PATH) and reads its machine-readable output.
 *
 * Progress and the final info dict are printed as JSON behind fixed prefixes, so
 * they can be told apart from ordinary log output on the merged stdout/stderr.
 */

import { execa, ExecaError } from "execa";
import { mkdir } from "fs/promises";
import path from "path";
import { z } from "zod";
import type {
  DownloadEngine,
  EngineCredentials,
  EngineDownloadRequest,
  EngineProgressEvent,
  ProgressListener,
  VideoFormat,
  VideoInfo,
} from "../../types/engine.js";
import type { TaskResult } from "../../types/task.js";
import { EngineError } from "../../utils/errors.js";

export const PROGRESS_PREFIX = "ytdlp-progress:";
export const RESULT_PREFIX = "ytdlp-result:";
export const STREAMS_PREFIX = "ytdlp-streams:";
export const OUTPUT_TEMPLATE = "%(title).180B [%(id)s].%(ext)s";

/** How many non-JSON output lines are kept for error reports. */
const DIAGNOSTIC_LINES = 50;

const optionalNumber = z.number().nullish();
const optionalString = z.string().nullish();

const progressLineSchema = z
  .object({
    status: z.enum(["downloading", "finished", "error"]),
    downloaded_bytes: optionalNumber,
    total_bytes: optionalNumber,
    total_bytes_estimate: optionalNumber,
    speed: optionalNumber,
    eta: optionalNumber,
    filename: optionalString,
    fragment_index: optionalNumber,
    fragment_count: optionalNumber,
  })
  .passthrough();

const formatSchema = z
  .object({
    format_id: z.string(),
    ext: optionalString,
    resolution: optionalString,
    fps: optionalNumber,
    vcodec: optionalString,
    acodec: optionalString,
    filesize: optionalNumber,
    filesize_approx: optionalNumber,
    tbr: optionalNumber,
    format_note: optionalString,
  })
  .passthrough();

const infoSchema = z
  .object({
    id: optionalString,
    title: optionalString,
    ext: optionalString,
    extractor: optionalString,
    webpage_url: optionalString,
    duration: optionalNumber,
    filesize: optionalNumber,
    filesize_approx: optionalNumber,
    format_id: optionalString,
    uploader: optionalString,
    thumbnail: optionalString,
    description: optionalString,
    filepath: optionalString,
    _filename: optionalString,
    filename: optionalString,
    requested_downloads: z
      .array(z.object({ filepath: optionalString, filename: optionalString }).passthrough())
      .nullish(),
    formats: z.array(formatSchema).nullish(),
  })
  .passthrough();

type YtDlpInfo = z.infer<typeof infoSchema>;

export class YtDlpEngine implements DownloadEngine {
  constructor(private readonly binaryPath: string = "yt-dlp") {}

  async download(request: EngineDownloadRequest, onProgress: ProgressListener): Promise<TaskResult> {
    await mkdir(request.outputPath, { recursive: true });

    console.log(`[ytdlp] Downloading ${request.url}`);
    console.log(`[ytdlp] Output dir: ${request.outputPath} (format: ${request.format})`);

    const subprocess = execa(this.binaryPath, buildDownloadArgs(request), {
      all: true,
      buffer: false,
      stdin: "ignore",
    });

    const diagnostics: string[] = [];
    let info: unknown;
    let streamCount: number | undefined;

    try {
      for await (const line of subprocess.iterable({ from: "all" })) {
        if (line.startsWith(PROGRESS_PREFIX)) {
          const event = parseProgressLine(line);
          if (event) onProgress(streamCount !== undefined ? { ...event, streamCount } : event);
        } else if (line.startsWith(STREAMS_PREFIX)) {
          streamCount = parseStreamCount(line);
        } else if (line.startsWith(RESULT_PREFIX)) {
          info = parseJson(line.slice(RESULT_PREFIX.length));
        } else if (line.trim()) {
          diagnostics.push(line);
          if (diagnostics.length > DIAGNOSTIC_LINES) diagnostics.shift();
        }
      }
      await subprocess;
    } catch (error) {
      throw toEngineError(error, diagnostics.join("\n"));
    }

    if (info === undefined) {
      throw new EngineError("yt-dlp finished without reporting the downloaded file", diagnostics.join("\n"));
    }

    const result = toTaskResult(info);
    console.log(`[ytdlp] ✓ Saved ${result.filePath}`);
    return result;
  }

  async getInfo(url: string, credentials?: EngineCredentials): Promise<VideoInfo> {
    const args = ["--dump-single-json", "--no-playlist", "--no-warnings", ...credentialArgs(credentials), "--", url];

    let stdout: string;
    try {
      ({ stdout } = await execa(this.binaryPath, args, { stdin: "ignore" }));
    } catch (error) {
      throw toEngineError(error, error instanceof ExecaError ? String(error.stderr ?? "") : "");
    }

    const raw = parseJson(stdout);
    if (raw === undefined) {
      throw new EngineError("yt-dlp returned unreadable metadata", stdout.slice(0, 2000));
    }
    return toVideoInfo(raw);
  }
}

export function buildDownloadArgs(request: EngineDownloadRequest): string[] {
  return [
    "--format",
    request.format,
    "--output",
    path.join(request.outputPath, OUTPUT_TEMPLATE),
    "--no-playlist",
    "--newline",
    "--progress",
    "--progress-template",
    `download:${PROGRESS_PREFIX}%(progress)j`,
    "--print",
    `before_dl:${STREAMS_PREFIX}%(requested_formats.:.format_id)j`,
    "--print",
    `after_move:${RESULT_PREFIX}%()j`,
    ...credentialArgs(request.credentials),
    "--",
    request.url,
  ];
}

function credentialArgs(credentials: EngineCredentials | undefined): string[] {
  const args: string[] = [];
  if (credentials?.cookieFile) args.push("--cookies", credentials.cookieFile);
  if (credentials?.cookiesFromBrowser) args.push("--cookies-from-browser", credentials.cookiesFromBrowser);
  return args;
}

/**
 * Parses one prefixed progress line. Returns null for anything unreadable.
 */
export function parseProgressLine(line: string): EngineProgressEvent | null {
  const parsed = progressLineSchema.safeParse(parseJson(line.slice(PROGRESS_PREFIX.length)));
  if (!parsed.success) {
    return null;
  }

  const data = parsed.data;
  const event: EngineProgressEvent = { status: data.status };
  if (isFiniteNumber(data.downloaded_bytes)) event.downloadedBytes = data.downloaded_bytes;
  if (isFiniteNumber(data.total_bytes)) event.totalBytes = data.total_bytes;
  if (isFiniteNumber(data.total_bytes_estimate)) event.totalBytesEstimate = data.total_bytes_estimate;
  if (isFiniteNumber(data.speed)) event.speed = data.speed;
  if (isFiniteNumber(data.eta)) event.eta = data.eta;
  if (data.filename) event.filename = data.filename;
  if (isFiniteNumber(data.fragment_index)) event.fragmentIndex = data.fragment_index;
  if (isFiniteNumber(data.fragment_count)) event.fragmentCount = data.fragment_count;
  return event;
}

/**
 * Reads the before-download line listing the requested format ids.
 * A single-file format has no requested_formats, which yt-dlp prints as "NA".
 */
export function parseStreamCount(line: string): number {
  const ids = parseJson(line.slice(STREAMS_PREFIX.length));
  return Array.isArray(ids) && ids.length > 0 ? ids.length : 1;
}

/**
 * Maps the after-move info dict to the persisted task result.
 */
export function toTaskResult(raw: unknown): TaskResult {
  const parsed = infoSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EngineError(`yt-dlp reported an unexpected result: ${parsed.error.message}`, "");
  }

  const info = parsed.data;
  const filePath = resolveFilePath(info);
  if (!filePath) {
    throw new EngineError("yt-dlp result does not name the downloaded file", "");
  }

  return {
    filePath,
    filename: path.basename(filePath),
    title: info.title ?? null,
    videoId: info.id ?? null,
    ext: info.ext ?? null,
    extractor: info.extractor ?? null,
    webpageUrl: info.webpage_url ?? null,
    durationSeconds: info.duration ?? null,
    filesizeBytes: info.filesize ?? info.filesize_approx ?? null,
    formatId: info.format_id ?? null,
    uploader: info.uploader ?? null,
    thumbnail: info.thumbnail ?? null,
  };
}

export function toVideoInfo(raw: unknown): VideoInfo {
  const parsed = infoSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EngineError(`yt-dlp returned unexpected metadata: ${parsed.error.message}`, "");
  }

  const info = parsed.data;
  return {
    id: info.id ?? null,
    title: info.title ?? null,
    extractor: info.extractor ?? null,
    webpageUrl: info.webpage_url ?? null,
    durationSeconds: info.duration ?? null,
    uploader: info.uploader ?? null,
    thumbnail: info.thumbnail ?? null,
    description: info.description ?? null,
    formats: (info.formats ?? []).map(
      (format): VideoFormat => ({
        formatId: format.format_id,
        ext: format.ext ?? null,
        resolution: format.resolution ?? null,
        fps: format.fps ?? null,
        vcodec: format.vcodec ?? null,
        acodec: format.acodec ?? null,
        filesizeBytes: format.filesize ?? format.filesize_approx ?? null,
        tbr: format.tbr ?? null,
        note: format.format_note ?? null,
      })
    ),
  };
}

function resolveFilePath(info: YtDlpInfo): string | undefined {
  const requested = info.requested_downloads?.[0];
  return (
    requested?.filepath ??
    info.filepath ??
    info._filename ??
    requested?.filename ??
    info.filename ??
    undefined
  );
}

function toEngineError(error: unknown, stderr: string): EngineError {
  // The command line is left out of the message: it holds URLs and paths the classifier would misread.
  if (error instanceof ExecaError) {
    const message =
      error.exitCode !== undefined
        ? `yt-dlp exited with code ${error.exitCode}`
        : `yt-dlp could not run: ${error.cause instanceof Error ? error.cause.message : error.shortMessage}`;
    console.error(`[ytdlp] ✗ ${message}`);
    return new EngineError(message, stderr, error.exitCode ?? null, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[ytdlp] ✗ ${message}`);
  return new EngineError(message, stderr, null, { cause: error });
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isFiniteNumber(value: number | null | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value);
}
