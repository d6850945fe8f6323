/**
 * LLM Provider Interface
 *
 * Backend-neutral abstraction for model calls. Providers speak canonical
 * messages and chat completions; wire formats stay inside the provider.
 */

import type { Message } from './canonical-format.js';
import type { StreamFragmentListener } from './providers/converse-stream.js';
import type { ChatCompletion, ToolChoice, ToolDeclaration } from '../types/agent-types.js';

export interface ChatParams {
  messages: readonly Message[];
  /** Prepended to `messages`; the last one becomes the system prompt */
  system?: readonly Message[];
  tools?: readonly ToolDeclaration[];
  toolChoice?: ToolChoice;
}

export interface LLMProvider {
  /** Send the conversation, get one completion back */
  chat(params: ChatParams): Promise<ChatCompletion>;

  /**
   * Same as chat(), but text and tool-input fragments are passed to
   * `onFragment` in arrival order while the response streams in.
   */
  chatStream(params: ChatParams, onFragment?: StreamFragmentListener): Promise<ChatCompletion>;
}
