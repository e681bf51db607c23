/**
 * Error Classifier
 * Turns a raw download failure into a typed ErrorRecord with remediation hints.
 *
 * Rules are checked in order and the first match wins, so narrower categories
 * (cookie_expired) sit above the broader ones that could also match
 * (authentication).
 */

import type { ErrorKind, ErrorRecord } from "../../types/task.js";

interface ClassificationRule {
  kind: ErrorKind;
  patterns: RegExp[];
  /** Node error codes (error.code) that map straight to this kind. */
  codes?: string[];
  retryPossible: boolean;
  suggestions: string[];
}

const RULES: readonly ClassificationRule[] = [
  {
    kind: "cookie_expired",
    patterns: [
      /cookies? (?:are|is) no longer valid/i,
      /cookies?[^\n]{0,60}\b(?:expired|invalid|rotated)\b/i,
      /(?:expired|invalid) cookies?/i,
      /failed to (?:load|read|decrypt) cookies/i,
      /could not (?:find|copy) [^\n]{0,40}cookies? database/i,
      /'[^']*' does not look like a netscape format cookies file/i,
    ],
    retryPossible: false,
    suggestions: [
      "Re-export the cookies from a browser session that is currently signed in",
      "Make sure the cookie file is in Netscape format",
      "Export cookies from a private window and close it right away so they are not rotated",
    ],
  },
  {
    kind: "authentication",
    patterns: [
      /sign in to confirm/i,
      /confirm you(?:'|’)?re not a bot/i,
      /(?:login|log in|sign in|sign-in) (?:is )?required/i,
      /this video requires (?:login|authentication|payment)/i,
      /members?[- ]only/i,
      /requires? (?:a )?(?:premium|subscription)/i,
      /use --cookies/i,
      /http error 401/i,
      /unauthorized/i,
    ],
    retryPossible: false,
    suggestions: [
      "Provide fresh cookies from a signed-in browser session",
      "Try cookiesFromBrowser with a browser profile that is signed in",
      "If the server runs on a cloud IP, authenticated requests are usually required",
    ],
  },
  {
    kind: "format_unavailable",
    patterns: [
      /requested format (?:is )?not available/i,
      /no video formats found/i,
      /invalid format specification/i,
      /format [^\n]{0,40}(?:is )?not available/i,
    ],
    retryPossible: false,
    suggestions: [
      "List the available formats with GET /videos/formats",
      'Use a generic selector such as "best" or "bestvideo+bestaudio/best"',
    ],
  },
  {
    kind: "source_restricted",
    patterns: [
      /video unavailable/i,
      /(?:this|the) video (?:is|has been) (?:private|removed|unavailable|deleted)/i,
      /private video/i,
      /not (?:made )?available in your (?:country|region|location)/i,
      /geo[- ]?restrict/i,
      /blocked[^\n]{0,40}(?:copyright|country|grounds)/i,
      /copyright/i,
      /age[- ]restricted|confirm your age/i,
      /this (?:content|live event) (?:is|will be) (?:not available|unavailable)/i,
      /unsupported url/i,
      /http error 40[34]/i,
    ],
    retryPossible: false,
    suggestions: [
      "Open the URL in a browser to check that the content is still available",
      "Region- or age-restricted content may need cookies from an account that can view it",
      "Check that the URL points to a supported site",
    ],
  },
  {
    kind: "filesystem",
    patterns: [
      /no space left on device/i,
      /disk (?:is )?full/i,
      /permission denied/i,
      /operation not permitted/i,
      /read-only file system/i,
      /unable to (?:open|create|write)[^\n]{0,40}(?:for writing|file|directory)/i,
      /file name too long/i,
    ],
    codes: ["ENOSPC", "EACCES", "EPERM", "EROFS", "ENAMETOOLONG", "EDQUOT", "EISDIR", "ENOTDIR"],
    retryPossible: false,
    suggestions: [
      "Check the free disk space on the server",
      "Check that the server can write to the output directory",
      "Try a different outputPath",
    ],
  },
  {
    kind: "network",
    patterns: [
      /timed? ?out/i,
      /connection (?:reset|refused|aborted|closed)/i,
      /network is unreachable/i,
      /temporary failure in name resolution/i,
      /name or service not known/i,
      /getaddrinfo/i,
      /unable to download (?:webpage|api page|video data)/i,
      /ssl(?:error)?[:\s]/i,
      /http error (?:5\d\d|429)/i,
      /too many requests/i,
      /incomplete ?read/i,
    ],
    codes: ["ETIMEDOUT", "ECONNRESET", "ECONNREFUSED", "ENOTFOUND", "EAI_AGAIN", "ENETUNREACH", "EHOSTUNREACH", "EPIPE"],
    retryPossible: true,
    suggestions: [
      "Check the server's internet connection",
      "Configure a proxy if the site is blocked from the server's network",
      "Retry the download in a few minutes",
    ],
  },
];

const UNKNOWN_SUGGESTIONS = [
  "Retry the download",
  "Update yt-dlp to the latest version",
  "Check the trace for the underlying error",
];

export class ErrorClassifier {
  constructor(private readonly now: () => Date = () => new Date()) {}

  classify(failure: unknown, context: Record<string, string>): ErrorRecord {
    const details = describeFailure(failure);
    const errorLines = findErrorLines(details.message, details.stderr);
    // WARNING lines in stderr often name a different problem than the one that ended the run.
    const haystack = (
      errorLines.length > 0
        ? [details.message, ...errorLines, details.name]
        : [details.message, details.stderr, details.name]
    ).join("\n");

    const rule = RULES.find(
      (candidate) =>
        (details.code !== undefined && candidate.codes?.includes(details.code)) ||
        candidate.patterns.some((pattern) => pattern.test(haystack))
    );

    return {
      kind: rule?.kind ?? "unknown",
      message: conciseMessage(details.message, errorLines),
      timestamp: this.now().toISOString(),
      trace: buildTrace(details),
      context: { ...context },
      retryPossible: rule?.retryPossible ?? true,
      suggestions: [...(rule?.suggestions ?? UNKNOWN_SUGGESTIONS)],
    };
  }
}

interface FailureDetails {
  message: string;
  name: string;
  stack: string;
  stderr: string;
  code?: string;
  exitCode?: number;
}

function describeFailure(failure: unknown): FailureDetails {
  if (failure instanceof Error) {
    const code = "code" in failure && typeof failure.code === "string" ? failure.code : undefined;
    const stderr = "stderr" in failure && typeof failure.stderr === "string" ? failure.stderr : "";
    const exitCode = "exitCode" in failure && typeof failure.exitCode === "number" ? failure.exitCode : undefined;
    return {
      message: failure.message,
      name: failure.name,
      stack: failure.stack ?? `${failure.name}: ${failure.message}`,
      stderr,
      code,
      exitCode,
    };
  }

  const message = typeof failure === "string" ? failure : String(failure);
  return { message, name: "", stack: message, stderr: "" };
}

/** yt-dlp's own "ERROR:" lines, in output order. */
function findErrorLines(message: string, stderr: string): string[] {
  return [message, stderr]
    .join("\n")
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.startsWith("ERROR:"));
}

/**
 * Prefers yt-dlp's first "ERROR:" line over a generic wrapper message.
 */
function conciseMessage(message: string, errorLines: string[]): string {
  const errorLine = errorLines[0];
  if (errorLine) {
    return errorLine.replace(/^ERROR:\s*/, "");
  }
  return message.trim() || "Unknown error";
}

function buildTrace(details: FailureDetails): string {
  const sections = [details.stack];
  if (details.exitCode !== undefined) sections.push(`--- exit code ${details.exitCode} ---`);
  if (details.stderr) sections.push(`--- stderr ---\n${details.stderr}`);
  return sections.filter(Boolean).join("\n");
}
