/**
 * Convergence control
 *
 * Decides whether an analysis asks for another research round. The round
 * ceiling itself is enforced by the orchestrator.
 */

import gapIndicators from "../../../data/gap-indicators.json";

export const DEFAULT_GAP_INDICATORS: readonly string[] = gapIndicators.phrases;

export class ConvergenceController {
  private readonly phrases: string[];

  constructor(phrases: readonly string[] = DEFAULT_GAP_INDICATORS) {
    this.phrases = phrases
      .map((phrase) => phrase.trim().toLowerCase())
      .filter((phrase) => phrase.length > 0);
  }

  /**
   * True when the analysis mentions any gap-indicator phrase (case-insensitive)
   */
  needsMoreResearch(analysisText: string): boolean {
    const text = analysisText.toLowerCase();
    return this.phrases.some((phrase) => text.includes(phrase));
  }
}
