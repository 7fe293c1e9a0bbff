/**
 * Agent Interface
 *
 * Contract the orchestrator expects from a model-backed agent.
 * Implementations decide how text is generated and which tools they call.
 */

export type AgentRole = "researcher" | "analyst" | "writer";

export interface Agent {
  readonly role: AgentRole;

  /**
   * Human-readable model description (shown in the initialization summary)
   */
  readonly name: string;

  /**
   * Run the agent to completion and return its final text
   */
  call(prompt: string): Promise<string>;

  /**
   * Run the agent and yield its output incrementally.
   * The sequence is finite and consumed once.
   */
  streamCall(prompt: string): AsyncIterable<string>;
}
