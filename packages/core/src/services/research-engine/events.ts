/**
 * Progress events
 *
 * The orchestrator's only output. Events and everything nested in their
 * data are frozen when created, and are written one JSON object per line
 * on the wire.
 */

import { isRecord } from "../../utils/json";

export const PROGRESS_EVENT_TYPES = [
  "status",
  "progress",
  "research_progress",
  "analysis_progress",
  "report_start",
  "report_chunk",
  "complete",
  "error",
] as const;

export type ProgressEventType = (typeof PROGRESS_EVENT_TYPES)[number];

export type ProgressStage =
  | "initialization"
  | "research"
  | "analysis"
  | "report"
  | "complete"
  | "error";

export type ProgressEventData = Readonly<Record<string, unknown>>;

export interface ProgressEvent {
  readonly type: ProgressEventType;
  readonly message: string;
  readonly progress: number;
  readonly step: string;
  readonly stage: ProgressStage;
  readonly data: ProgressEventData;
}

/**
 * Payload of the terminal `complete` event
 */
export interface CompletionData {
  query: string;
  final_report: string;
  research_findings: string;
  analysis: string;
  research_loops: number;
  timestamp: string;
}

export function isProgressEventType(value: unknown): value is ProgressEventType {
  return PROGRESS_EVENT_TYPES.some((type) => type === value);
}

const STAGES: readonly ProgressStage[] = [
  "initialization",
  "research",
  "analysis",
  "report",
  "complete",
  "error",
];

function isProgressStage(value: unknown): value is ProgressStage {
  return STAGES.some((stage) => stage === value);
}

/**
 * Freeze a value and every object or array reachable from it
 */
function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

export function createEvent(
  type: ProgressEventType,
  stage: ProgressStage,
  step: string,
  message: string,
  progress: number,
  data: Record<string, unknown> = {}
): ProgressEvent {
  return Object.freeze({
    type,
    message,
    progress,
    step,
    stage,
    data: deepFreeze({ ...data }),
  });
}

/**
 * One NDJSON line (terminated by "\n")
 */
export function serializeEvent(event: ProgressEvent): string {
  return `${JSON.stringify(event)}\n`;
}

/**
 * Parse one line of the event stream. Blank lines, malformed JSON and
 * unknown event types yield undefined so that consumers can skip them.
 */
export function parseEventLine(line: string): ProgressEvent | undefined {
  const trimmed = line.trim();
  if (!trimmed) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return undefined;
  }

  if (!isRecord(parsed) || !isProgressEventType(parsed.type)) {
    return undefined;
  }

  const { type, message, progress, step, stage, data } = parsed;
  if (
    typeof message !== "string" ||
    typeof progress !== "number" ||
    typeof step !== "string" ||
    !isProgressStage(stage)
  ) {
    return undefined;
  }

  return createEvent(
    type,
    stage,
    step,
    message,
    progress,
    isRecord(data) ? data : {}
  );
}
