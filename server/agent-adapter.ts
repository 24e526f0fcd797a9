/**
 * Agent adapter: turns one transcript into one spoken-style reply.
 *
 * The rest of the server sees only `respond({ text, userId, sessionId })`.
 * The default implementation calls the Anthropic Messages API with a short
 * news/stock assistant prompt and keeps a bounded per-session history so
 * follow-up questions have context.
 *
 * Responsibilities:
 * - Define the AgentAdapter contract used by the session manager
 * - Keep and trim per-session conversation history
 * - Call the Anthropic Messages API and join its text blocks
 * - Drop a session's history when the session ends
 */

import Anthropic from "@anthropic-ai/sdk";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Default Anthropic model for replies */
export const DEFAULT_AGENT_MODEL = "claude-haiku-4-5-20251001";

/** Max tokens per reply (replies are spoken, so they stay short) */
const REPLY_MAX_TOKENS = 400;

/** Messages (user + assistant) kept per session */
const MAX_HISTORY_MESSAGES = 12;

const SYSTEM_PROMPT = [
  "You are a voice assistant for financial news and stock market questions.",
  "Your reply is converted to speech, so answer in two to four short spoken sentences.",
  "Do not use markdown, lists, tables, URLs, or symbols that cannot be read aloud.",
  "Say ticker symbols letter by letter and round prices to two decimals.",
  "If you do not have current data for something, say so plainly instead of guessing.",
].join(" ");

// ============================================================================
// INTERFACES
// ============================================================================

/** One utterance to answer */
export interface AgentRequest {
  text: string;
  userId: string;
  sessionId: string;
  /** Aborted when the caller stops waiting; a reply that lands afterwards is not recorded */
  signal?: AbortSignal;
}

/**
 * Opaque reply function plus a hook to release per-session state.
 */
export interface AgentAdapter {
  /**
   * Produce a reply to one user utterance.
   * @returns Reply text (may be empty; the caller treats that as a failure)
   */
  respond(request: AgentRequest): Promise<string>;
  /** Forget everything kept for a session */
  forget(sessionId: string): void;
}

/** One turn of conversation history */
export interface ChatTurn {
  role: "user" | "assistant";
  content: string;
}

/**
 * Sends a conversation to the model and returns the reply text.
 * Swappable so the adapter's history handling can be exercised without the API.
 */
export type ReplyModel = (turns: ChatTurn[], system: string, signal?: AbortSignal) => Promise<string>;

export interface AnthropicAgentConfig {
  /** Anthropic API key (empty disables the agent; every call then fails) */
  apiKey: string;
  /** Model ID */
  model: string;
  /** Overrides the Anthropic call */
  replyModel?: ReplyModel;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Create an AgentAdapter backed by the Anthropic Messages API.
 *
 * @param config - API key, model, and optional model override
 * @returns An AgentAdapter
 */
export function createAnthropicAgent(config: AnthropicAgentConfig): AgentAdapter {
  const replyModel = config.replyModel ?? createAnthropicReplyModel(config.apiKey, config.model);
  const histories = new Map<string, ChatTurn[]>();

  async function respond(request: AgentRequest): Promise<string> {
    const history = histories.get(request.sessionId) ?? [];
    const turns: ChatTurn[] = [...history, { role: "user", content: request.text }];

    const reply = (await replyModel(turns, SYSTEM_PROMPT, request.signal)).trim();

    // Only record the exchange once it succeeded and the caller still wanted it
    if (reply && !request.signal?.aborted) {
      turns.push({ role: "assistant", content: reply });
      histories.set(request.sessionId, turns.slice(-MAX_HISTORY_MESSAGES));
    }

    return reply;
  }

  function forget(sessionId: string): void {
    histories.delete(sessionId);
  }

  return { respond, forget };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Build the default ReplyModel that calls the Anthropic API.
 * The client is created on first use so a missing key only fails requests.
 *
 * @param apiKey - Anthropic API key
 * @param model - Model ID
 * @returns A ReplyModel
 */
function createAnthropicReplyModel(apiKey: string, model: string): ReplyModel {
  let client: Anthropic | null = null;

  return async (turns, system, signal) => {
    if (!apiKey) throw new Error("ANTHROPIC_API_KEY is not set");
    client ??= new Anthropic({ apiKey });

    const response = await client.messages.create(
      {
        model,
        max_tokens: REPLY_MAX_TOKENS,
        system,
        messages: turns,
      },
      { signal }
    );

    return response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");
  };
}
