/**
 * Agent Loop
 *
 * Think/act step loop over one conversation: call the model with the
 * conversation and the tool declarations, run the tools it asks for, feed the
 * results back, repeat until the model signals completion or the step cap is
 * reached.
 *
 * One instance owns one conversation's memory and is not safe for concurrent
 * use; AgentPool serializes access per conversation key.
 */

import { Memory, Message, DEFAULT_MAX_MESSAGES } from './canonical-format.js';
import { AgentStateError, ConversionError } from './errors.js';
import type { LLMProvider, ChatParams } from './llm-provider.js';
import { PromptBuilder } from './prompt-builder.js';
import { PLACEHOLDER_CONTENT, parseToolArguments } from './providers/converse-format.js';
import type { StreamFragment } from './providers/converse-stream.js';
import { ToolRegistry } from './tool-registry.js';
import { TERMINATE_TOOL_NAME, terminateTool } from './tools/terminate.js';
import { shouldLog } from '../config/index.js';
import { EventChannel } from '../messaging/event-channel.js';
import { AgentState } from '../types/agent-types.js';
import type {
  AgentRunOutcome,
  AgentRunResult,
  AgentStreamEvent,
  AgentUsageStats,
  ChatCompletion,
  ToolCall,
  ToolChoice,
} from '../types/agent-types.js';

export const DEFAULT_MAX_STEPS = 20;
export const DEFAULT_DUPLICATE_THRESHOLD = 2;

export const FALLBACK_REPLY = 'Sorry, I could not generate a reply.';
export const FAILURE_REPLY = 'Something went wrong while processing your request. Please try again.';
export const STUCK_DIRECTIVE =
  'Observed duplicate responses. Consider new strategies and avoid repeating ineffective paths already attempted.';

export interface AgentLoopConfig {
  provider: LLMProvider;
  /** Defaults to a registry holding only the terminate tool */
  toolRegistry?: ToolRegistry;
  promptBuilder?: PromptBuilder;
  name?: string;
  maxSteps?: number;
  maxMessages?: number;
  /** Earlier identical assistant replies needed to count as stuck */
  duplicateThreshold?: number;
  /** Number of most recent assistant replies inspected, the latest included */
  stuckWindow?: number;
  toolChoice?: ToolChoice;
  /** Tools whose successful call finishes the run */
  specialToolNames?: string[];
  /** A reply without tool calls finishes the run (unless tools are required) */
  finishOnReply?: boolean;
  /** run() consumes the backend's streaming API */
  stream?: boolean;
}

export interface StepOptions {
  streaming?: boolean;
  emit?: (event: AgentStreamEvent) => void;
}

interface ToolExecution {
  observation: string;
  failed: boolean;
  base64Image?: string;
}

export class AgentLoop {
  readonly name: string;
  readonly memory: Memory;
  readonly maxSteps: number;
  readonly duplicateThreshold: number;
  readonly stuckWindow: number;

  private provider: LLMProvider;
  private toolRegistry: ToolRegistry;
  private promptBuilder: PromptBuilder;
  private toolChoice: ToolChoice;
  private specialToolNames: Set<string>;
  private finishOnReply: boolean;
  private streamByDefault: boolean;

  private _state: AgentState = AgentState.IDLE;
  private _currentStep = 0;
  private usage: AgentUsageStats = emptyUsage();
  private lastNudged: Message | undefined;
  /** Input of the current run, restated when eviction dropped every user message */
  private runInput: string | undefined;

  constructor(config: AgentLoopConfig) {
    this.provider = config.provider;
    this.toolRegistry = config.toolRegistry ?? new ToolRegistry([terminateTool()]);
    this.promptBuilder = config.promptBuilder ?? new PromptBuilder();
    this.name = config.name ?? 'agent';
    this.memory = new Memory(config.maxMessages ?? DEFAULT_MAX_MESSAGES);
    this.maxSteps = config.maxSteps ?? DEFAULT_MAX_STEPS;
    this.duplicateThreshold = config.duplicateThreshold ?? DEFAULT_DUPLICATE_THRESHOLD;
    this.stuckWindow = config.stuckWindow ?? this.duplicateThreshold + 1;
    this.toolChoice = config.toolChoice ?? 'auto';
    this.specialToolNames = new Set(config.specialToolNames ?? [TERMINATE_TOOL_NAME]);
    this.finishOnReply = config.finishOnReply ?? true;
    this.streamByDefault = config.stream ?? false;

    if (!Number.isInteger(this.maxSteps) || this.maxSteps < 1) {
      throw new RangeError(`maxSteps must be a positive integer, got ${this.maxSteps}`);
    }
    if (this.duplicateThreshold < 1 || this.stuckWindow <= this.duplicateThreshold) {
      throw new RangeError('stuckWindow must be larger than duplicateThreshold, which must be at least 1');
    }
  }

  get state(): AgentState {
    return this._state;
  }

  get currentStep(): number {
    return this._currentStep;
  }

  /**
   * Replace memory with prior conversation records, oldest first.
   */
  rehydrate(history: readonly unknown[]): void {
    this.assertIdle();
    const messages = history.map((record) => Message.fromDict(record));
    this.memory.clear();
    this.memory.addMessages(messages);
  }

  /** The newest assistant reply with content, or a fixed fallback */
  replyText(): string {
    const messages = this.memory.messages;
    for (let i = messages.length - 1; i >= 0; i--) {
      const message = messages[i];
      if (message.role === 'assistant' && message.content && message.content !== PLACEHOLDER_CONTENT) {
        return message.content;
      }
    }
    return FALLBACK_REPLY;
  }

  /**
   * Run to completion. Rejects with AgentStateError when not IDLE; every
   * other failure is reported through the result.
   */
  async run(input: string): Promise<AgentRunResult> {
    let result: AgentRunResult | undefined;
    for await (const event of this.execute(input, this.streamByDefault)) {
      if (event.type === 'done') result = event.result;
    }
    if (!result) {
      throw new Error('Agent run ended without a result');
    }
    return result;
  }

  /**
   * Run while streaming step markers, text fragments and tool activity, ending
   * with a `done` event. The generator is single-use.
   */
  runStream(input: string): AsyncGenerator<AgentStreamEvent, void, undefined> {
    return this.execute(input, true);
  }

  /**
   * One think/act cycle. Returns a summary of what happened.
   */
  async step(options: StepOptions = {}): Promise<string> {
    this._currentStep++;
    const step = this._currentStep;
    const emit = options.emit ?? (() => undefined);

    const completion = await this.think(step, options.streaming ?? false, emit);
    const choice = completion.choices[0];
    if (!choice) {
      throw new ConversionError('Backend returned no choices');
    }

    const content = choice.message.content;
    const toolCalls = choice.message.tool_calls ?? [];
    if (shouldLog('debug')) {
      console.log(`[AgentLoop] ${this.name} step ${step}: ${toolCalls.length} tool call(s)`);
    }

    if (toolCalls.length > 0) {
      this.memory.addMessage(Message.fromToolCalls(toolCalls, content));
      return this.act(step, toolCalls, emit);
    }

    this.memory.addMessage(Message.assistant(content));
    if (this.toolChoice === 'required') {
      return 'Model replied without the required tool call';
    }
    if (this.finishOnReply) {
      this._state = AgentState.FINISHED;
    }
    return content;
  }

  /**
   * True when the newest assistant reply repeats earlier replies in the
   * recent window at least `duplicateThreshold` times.
   */
  isStuck(): boolean {
    const replies = this.memory.messages.filter((m) => m.role === 'assistant');
    const latest = replies[replies.length - 1];
    if (!latest || !latest.content || latest.content === PLACEHOLDER_CONTENT) return false;

    const earlier = replies.slice(-this.stuckWindow, -1);
    const duplicates = earlier.filter((m) => m.content === latest.content).length;
    return duplicates >= this.duplicateThreshold;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async *execute(input: string, streaming: boolean): AsyncGenerator<AgentStreamEvent, void, undefined> {
    this.assertIdle();
    this._state = AgentState.RUNNING;
    this._currentStep = 0;
    this.usage = emptyUsage();
    this.runInput = input;
    this.memory.addMessage(Message.user(input));

    const summaries: string[] = [];
    let outcome: AgentRunOutcome = 'max_steps';
    let failure: Error | undefined;
    // The step in progress; a consumer that stops iterating does not stop it
    let inFlight: Promise<unknown> | undefined;

    try {
      while (this._currentStep < this.maxSteps && this.state !== AgentState.FINISHED) {
        const step = this._currentStep + 1;
        yield { type: 'step_start', step };

        const channel = new EventChannel<AgentStreamEvent>();
        const pending = this.step({ streaming, emit: (event) => channel.push(event) })
          .then(
            (summary) => ({ ok: true as const, summary }),
            (error: unknown) => ({ ok: false as const, error })
          )
          .finally(() => channel.close());
        inFlight = pending;

        for await (const event of channel) {
          yield event;
        }

        const settled = await pending;
        if (!settled.ok) throw settled.error;

        summaries.push(`Step ${step}: ${settled.summary}`);
        yield { type: 'step_end', step, summary: settled.summary };

        const directive = this.nudgeIfStuck();
        if (directive) yield { type: 'nudge', step, directive };
      }

      if (this.state === AgentState.FINISHED) {
        outcome = 'finished';
      } else {
        summaries.push(`Terminated: Reached max steps (${this.maxSteps})`);
        console.log(`[AgentLoop] ${this.name} reached max steps (${this.maxSteps})`);
      }
    } catch (error) {
      this._state = AgentState.ERROR;
      failure = error instanceof Error ? error : new Error(String(error));
      outcome = 'error';
      console.error(`[AgentLoop] ${this.name} failed at step ${this._currentStep}: ${failure.message}`);
    } finally {
      if (inFlight) await inFlight;
      this._state = AgentState.IDLE;
    }

    const result: AgentRunResult = {
      outcome,
      steps: this._currentStep,
      summaries,
      reply: outcome === 'error' ? FAILURE_REPLY : this.replyText(),
      usage: { ...this.usage },
    };
    if (failure) result.error = failure;

    yield { type: 'done', step: this._currentStep, result };
  }

  private async think(
    step: number,
    streaming: boolean,
    emit: (event: AgentStreamEvent) => void
  ): Promise<ChatCompletion> {
    const directives: string[] = [];
    const conversation: Message[] = [];
    for (const message of this.memory.messages) {
      if (message.role === 'system') {
        if (message.content) directives.push(message.content);
      } else {
        conversation.push(message);
      }
    }

    const params: ChatParams = {
      messages: dropLeadingOrphans(conversation, this.runInput),
      system: [Message.system(this.promptBuilder.buildSystemPrompt(directives))],
      tools: this.toolChoice === 'none' ? [] : this.toolRegistry.toParams(),
      toolChoice: this.toolChoice,
    };

    let completion: ChatCompletion;
    if (streaming) {
      completion = await this.provider.chatStream(params, (fragment: StreamFragment) => {
        emit({ type: fragment.kind === 'text' ? 'text' : 'tool_input', step, text: fragment.text });
      });
    } else {
      completion = await this.provider.chat(params);
      const content = completion.choices[0]?.message.content;
      if (content && content !== PLACEHOLDER_CONTENT) emit({ type: 'text', step, text: content });
    }

    this.usage.inputTokens += completion.usage.prompt_tokens;
    this.usage.outputTokens += completion.usage.completion_tokens;
    this.usage.totalTokens += completion.usage.total_tokens;
    return completion;
  }

  private async act(step: number, toolCalls: ToolCall[], emit: (event: AgentStreamEvent) => void): Promise<string> {
    const observations: string[] = [];

    for (const call of toolCalls) {
      const toolName = call.function.name;
      emit({ type: 'tool_call', step, toolCallId: call.id, toolName, arguments: call.function.arguments });

      const execution = await this.executeToolCall(call);
      this.memory.addMessage(Message.tool(execution.observation, toolName, call.id, execution.base64Image));

      emit({
        type: 'tool_result',
        step,
        toolCallId: call.id,
        toolName,
        status: execution.failed ? 'failed' : 'completed',
        observation: execution.observation,
      });
      observations.push(execution.observation);
    }

    return observations.join('\n\n');
  }

  private async executeToolCall(call: ToolCall): Promise<ToolExecution> {
    const toolName = call.function.name;

    let args: Record<string, unknown>;
    try {
      args = parseToolArguments(call.function.arguments, toolName);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.log(`[AgentLoop] ${toolName} arguments rejected: ${reason}`);
      return { observation: `Error: ${reason}`, failed: true };
    }

    if (shouldLog('debug')) console.log(`[AgentLoop] Executing tool: ${toolName}`);
    const result = await this.toolRegistry.execute(toolName, args);

    if (result.error) {
      console.log(`[AgentLoop] ${toolName} FAILED: ${result.error.substring(0, 300)}`);
      return { observation: result.toString(), failed: true, base64Image: result.base64_image };
    }

    if (this.specialToolNames.has(toolName)) {
      console.log(`[AgentLoop] Special tool '${toolName}' has completed the task`);
      this._state = AgentState.FINISHED;
    }

    const output = result.toString();
    const observation = output
      ? `Observed output of cmd \`${toolName}\` executed:\n${output}`
      : `Cmd \`${toolName}\` completed with no output`;
    return { observation, failed: false, base64Image: result.base64_image };
  }

  /**
   * Inject a strategy-change directive when stuck. Returns the directive, or
   * undefined when no nudge was needed.
   */
  private nudgeIfStuck(): string | undefined {
    if (!this.isStuck()) return undefined;
    const latest = this.memory.messages.filter((m) => m.role === 'assistant').pop();
    if (!latest || latest === this.lastNudged) return undefined;

    this.lastNudged = latest;
    this.memory.addMessage(Message.system(STUCK_DIRECTIVE));
    console.warn(`[AgentLoop] ${this.name} detected duplicate replies, nudging for a new strategy`);
    return STUCK_DIRECTIVE;
  }

  private assertIdle(): void {
    if (this._state !== AgentState.IDLE) {
      throw new AgentStateError(`Cannot start a run while the agent is ${this._state}`);
    }
  }
}

function emptyUsage(): AgentUsageStats {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

/**
 * Drop messages ahead of the first user message; they lost their context to
 * memory eviction (e.g. a tool result whose tool call was evicted). When no
 * user message is left, the conversation restarts at the first assistant turn
 * behind a restatement of the run's input.
 */
function dropLeadingOrphans(conversation: Message[], input: string | undefined): Message[] {
  const firstUser = conversation.findIndex((m) => m.role === 'user');
  if (firstUser >= 0) return conversation.slice(firstUser);

  const firstAssistant = conversation.findIndex((m) => m.role === 'assistant');
  const rest = firstAssistant >= 0 ? conversation.slice(firstAssistant) : [];
  return input === undefined ? rest : [Message.user(input), ...rest];
}
