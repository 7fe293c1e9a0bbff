/**
 * Research orchestrator
 * Core logic for executing the research flow
 *
 * INIT -> COLLECT -> ANALYZE -> REFINE (bounded) -> REPORT -> DONE
 *
 * `run` is an async generator: every stage reports through ProgressEvents
 * and any agent failure ends the session with a single `error` event.
 * Progress never decreases and 100 is only reached on `complete`.
 */

import type { Agent } from "../../interfaces/agent";
import {
  AgentInvocationError,
  toError,
  withTimeout,
} from "../../errors";
import { logger } from "../../logger";
import {
  buildAdditionalResearchPrompt,
  buildAnalysisPrompt,
  buildReportPrompt,
  buildResearchPrompt,
} from "../llm/prompts";
import { ToolCallAdapter } from "../tools/tool-call-adapter";
import { getConfig, type ResearchConfig } from "./config";
import { ConvergenceController } from "./convergence";
import {
  createEvent,
  type CompletionData,
  type ProgressEvent,
  type ProgressEventType,
  type ProgressStage,
} from "./events";
import { buildInitializationSummary } from "./initialization";
import { detectLanguage, getLanguageDisplayName } from "./language";
import { formatSearchActivity, summarizeSearchActivity } from "./search-summary";
import type {
  Language,
  OrchestratorDependencies,
  ResearchSession,
} from "./types";

const log = logger.child("orchestrator");

export const ADDITIONAL_RESEARCH_SEPARATOR = "\n\n--- Additional Research ---\n\n";

// Progress checkpoints
const PROGRESS = {
  initialized: 5,
  researchStart: 15,
  researchDone: 30,
  researchComplete: 35,
  analysisStart: 45,
  analysisDone: 52,
  analysisComplete: 55,
  refineStart: 58,
  refineEnd: 84,
  reportStart: 85,
  reportStreaming: 87,
  reportChunkStep: 0.5,
  reportChunkCap: 95,
  reportComplete: 95,
  complete: 100,
} as const;

const PREVIEW_LENGTH = 500;

/**
 * Keeps progress monotonic and remembers whether a terminal event was sent
 */
class ProgressEmitter {
  private lastProgress = 0;
  private finished = false;

  get last(): number {
    return this.lastProgress;
  }

  get terminated(): boolean {
    return this.finished;
  }

  emit(
    type: ProgressEventType,
    stage: ProgressStage,
    step: string,
    message: string,
    progress: number,
    data: Record<string, unknown> = {}
  ): ProgressEvent {
    const rounded = Math.round(Math.min(100, progress) * 10) / 10;
    this.lastProgress = Math.max(this.lastProgress, rounded);
    if (type === "complete" || type === "error") {
      this.finished = true;
    }
    return createEvent(type, stage, step, message, this.lastProgress, data);
  }
}

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH
    ? `${text.slice(0, PREVIEW_LENGTH)}...`
    : text;
}

function clampRounds(maxRounds: number): number {
  return Number.isFinite(maxRounds) ? Math.max(1, Math.floor(maxRounds)) : 1;
}

/**
 * Progress for a refinement round, spread over [refineStart, refineEnd]
 * so that any round count fits before the report stage
 */
function refineProgress(round: number, maxRounds: number, offset: number): number {
  const span =
    (PROGRESS.refineEnd - PROGRESS.refineStart) / Math.max(1, maxRounds - 1);
  return PROGRESS.refineStart + (round - 1 + offset) * span;
}

export class ResearchOrchestrator {
  private readonly config: ResearchConfig;
  private readonly adapter: ToolCallAdapter;
  private readonly convergence: ConvergenceController;
  private readonly clock: () => Date;

  constructor(private readonly deps: OrchestratorDependencies) {
    this.config = deps.config ?? getConfig();
    this.adapter = deps.toolCallAdapter ?? new ToolCallAdapter();
    this.convergence = deps.convergence ?? new ConvergenceController();
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Run one research session. Each call owns a fresh session; the returned
   * generator is finite and cannot be restarted.
   */
  async *run(
    query: string,
    maxRounds: number = this.config.research.maxResearchLoops
  ): AsyncGenerator<ProgressEvent, void, undefined> {
    const emitter = new ProgressEmitter();
    const trimmed = query.trim();

    if (!trimmed) {
      yield emitter.emit(
        "error",
        "error",
        "validation_error",
        "Research failed: query must not be empty",
        0,
        { message: "Query must not be empty", error: "Empty query" }
      );
      return;
    }

    const { language, autoDetected } = this.chooseLanguage(trimmed);
    const session: ResearchSession = {
      query: trimmed,
      language,
      stage: "INIT",
      loopCount: 1,
      findings: "",
      analysis: "",
      reportChunks: [],
    };

    try {
      yield* this.stages(session, clampRounds(maxRounds), autoDetected, emitter);
    } catch (error) {
      if (emitter.terminated) {
        log.error("Error after session end", { error: toError(error).message });
        return;
      }
      yield this.failure(session, emitter, "error", error);
    }
  }

  private chooseLanguage(query: string): {
    language: Language;
    autoDetected: boolean;
  } {
    const configured = this.deps.language ?? this.config.research.language;
    if (configured !== "auto") {
      return { language: configured, autoDetected: false };
    }

    const detection = detectLanguage(query);
    log.debug("Detected query language", {
      language: detection.language,
      confidence: detection.confidence,
    });
    return { language: detection.language, autoDetected: true };
  }

  /**
   * Call an agent under the configured deadline, then give the tool call
   * adapter a chance to replace the text with a recovered tool result
   */
  private async invoke(agent: Agent, prompt: string): Promise<string> {
    let text: string;
    try {
      text = await withTimeout(
        agent.call(prompt),
        this.config.limits.agentTimeoutMs,
        `${agent.role} agent`
      );
    } catch (error) {
      throw new AgentInvocationError(
        agent.role,
        `${agent.role} agent failed: ${toError(error).message}`,
        { cause: error }
      );
    }

    const recovered = await this.adapter.recover(text, this.deps.tools);
    return recovered ? recovered.text : text;
  }

  private failure(
    session: ResearchSession,
    emitter: ProgressEmitter,
    step: string,
    error: unknown
  ): ProgressEvent {
    const err = toError(error);
    session.stage = "ERROR";

    log.error("Research session failed", {
      query: session.query,
      step,
      role: err instanceof AgentInvocationError ? err.role : undefined,
      error: err.message,
    });

    return emitter.emit(
      "error",
      "error",
      step,
      `Research failed: ${err.message}`,
      emitter.last,
      {
        message: `Research failed during ${step.replace(/_/g, " ")}`,
        error: err.message,
      }
    );
  }

  private async *stages(
    session: ResearchSession,
    maxRounds: number,
    autoDetected: boolean,
    emitter: ProgressEmitter
  ): AsyncGenerator<ProgressEvent, void, undefined> {
    const { researcher, analyst, writer } = this.deps;
    const { query, language } = session;
    const displayLanguage = getLanguageDisplayName(language);

    // INIT
    const initialization = buildInitializationSummary({
      query,
      language,
      autoDetected,
      maxRounds,
      agents: { researcher, analyst, writer },
      searchBackends: this.config.search.backends,
      startedAt: this.clock(),
    });

    log.info("Starting research session", { query, language, maxRounds });

    yield emitter.emit(
      "status",
      "initialization",
      "initialization",
      initialization.text,
      PROGRESS.initialized,
      {
        query,
        language,
        language_display_name: displayLanguage,
        query_type: initialization.queryType,
        max_research_loops: maxRounds,
      }
    );

    // COLLECT
    session.stage = "COLLECT";
    yield emitter.emit(
      "status",
      "research",
      "initial_research",
      "Collecting information from multiple sources...",
      PROGRESS.researchStart
    );

    try {
      session.findings = await this.invoke(
        researcher,
        buildResearchPrompt(query, displayLanguage)
      );
    } catch (error) {
      yield this.failure(session, emitter, "research_error", error);
      return;
    }

    yield emitter.emit(
      "research_progress",
      "research",
      "research_complete",
      "Initial information collection finished",
      PROGRESS.researchDone,
      {
        findings_length: session.findings.length,
        findings_preview: preview(session.findings),
      }
    );

    const searchSummary = summarizeSearchActivity(
      query,
      session.findings,
      this.clock()
    );
    yield emitter.emit(
      "progress",
      "research",
      "initial_research_complete",
      formatSearchActivity(searchSummary),
      PROGRESS.researchComplete,
      {
        findings_preview: preview(session.findings),
        search_summary: searchSummary,
      }
    );

    // ANALYZE
    session.stage = "ANALYZE";
    yield emitter.emit(
      "status",
      "analysis",
      "analysis",
      "Analyzing research findings...",
      PROGRESS.analysisStart
    );

    try {
      session.analysis = await this.invoke(
        analyst,
        buildAnalysisPrompt(query, session.findings, displayLanguage)
      );
    } catch (error) {
      yield this.failure(session, emitter, "analysis_error", error);
      return;
    }

    yield emitter.emit(
      "analysis_progress",
      "analysis",
      "analysis_complete",
      "Analysis of findings finished",
      PROGRESS.analysisDone,
      { analysis_preview: preview(session.analysis) }
    );

    yield emitter.emit(
      "progress",
      "analysis",
      "analysis_complete",
      "Findings analyzed",
      PROGRESS.analysisComplete,
      {
        needs_more_research: this.convergence.needsMoreResearch(
          session.analysis
        ),
      }
    );

    // REFINE
    while (
      session.loopCount < maxRounds &&
      this.convergence.needsMoreResearch(session.analysis)
    ) {
      session.stage = "REFINE";
      const round = session.loopCount;

      yield emitter.emit(
        "status",
        "research",
        `additional_research_${round}`,
        `Conducting additional research (round ${round} of ${maxRounds - 1})...`,
        refineProgress(round, maxRounds, 0),
        { research_loop: round, max_research_loops: maxRounds }
      );

      let additional: string;
      try {
        additional = await this.invoke(
          researcher,
          buildAdditionalResearchPrompt(query, session.analysis, displayLanguage)
        );
      } catch (error) {
        yield this.failure(session, emitter, "additional_research_error", error);
        return;
      }

      session.findings = `${session.findings}${ADDITIONAL_RESEARCH_SEPARATOR}${additional}`;

      try {
        session.analysis = await this.invoke(
          analyst,
          buildAnalysisPrompt(query, session.findings, displayLanguage)
        );
      } catch (error) {
        yield this.failure(session, emitter, "analysis_error", error);
        return;
      }

      session.loopCount += 1;

      yield emitter.emit(
        "progress",
        "research",
        `additional_research_${round}_complete`,
        `Additional research round ${round} complete`,
        refineProgress(round, maxRounds, 0.5),
        {
          research_loop: session.loopCount,
          findings_preview: preview(additional),
        }
      );
    }

    // REPORT
    session.stage = "REPORT";
    yield emitter.emit(
      "status",
      "report",
      "final_report",
      "Generating final report...",
      PROGRESS.reportStart
    );

    yield emitter.emit(
      "report_start",
      "report",
      "report_streaming_start",
      "Report generation started",
      PROGRESS.reportStreaming
    );

    const stream = writer.streamCall(
      buildReportPrompt(query, session.analysis, session.findings, displayLanguage)
    );
    const iterator = stream[Symbol.asyncIterator]();
    let drained = false;

    try {
      for (;;) {
        let next: IteratorResult<string>;
        try {
          next = await withTimeout(
            iterator.next(),
            this.config.limits.streamIdleTimeoutMs,
            "writer agent stream"
          );
        } catch (error) {
          throw new AgentInvocationError(
            "writer",
            `writer agent failed: ${toError(error).message}`,
            { cause: error }
          );
        }

        if (next.done) {
          drained = true;
          break;
        }
        if (!next.value) continue;

        session.reportChunks.push(next.value);
        const chunkIndex = session.reportChunks.length;

        yield emitter.emit(
          "report_chunk",
          "report",
          "report_streaming",
          next.value,
          Math.min(
            PROGRESS.reportStreaming + PROGRESS.reportChunkStep * chunkIndex,
            PROGRESS.reportChunkCap
          ),
          { chunk: next.value, chunk_index: chunkIndex }
        );
      }
    } catch (error) {
      yield this.failure(session, emitter, "report_error", error);
      return;
    } finally {
      if (!drained && iterator.return) {
        void iterator.return().catch((error: unknown) => {
          log.warn("Failed to close writer stream", {
            error: toError(error).message,
          });
        });
      }
    }

    const finalReport = session.reportChunks.join("");
    if (!finalReport) {
      log.warn("Writer produced an empty report", { query });
    }

    yield emitter.emit(
      "progress",
      "report",
      "final_report_complete",
      "Final report generated",
      PROGRESS.reportComplete,
      { report_length: finalReport.length }
    );

    // DONE
    session.stage = "DONE";
    const completion: CompletionData = {
      query,
      final_report: finalReport,
      research_findings: session.findings,
      analysis: session.analysis,
      research_loops: session.loopCount,
      timestamp: this.clock().toISOString(),
    };

    log.info("Research session complete", {
      query,
      researchLoops: session.loopCount,
      reportLength: finalReport.length,
    });

    yield emitter.emit(
      "complete",
      "complete",
      "complete",
      "Research complete",
      PROGRESS.complete,
      { ...completion }
    );
  }
}
