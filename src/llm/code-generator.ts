/**
 * Workflow code generation.
 *
 * Turns a natural-language task description into JavaScript defining
 * `async function executeWorkflow(userInput)`. The generator is a black box
 * to the rest of the service: anything that returns code text can stand in.
 *
 * All outputs are treated as untrusted: they are only parsed here, and run
 * exclusively inside the sandbox.
 */

import vm from 'vm';
import { CompileError } from '../domain/errors';
import { ENTRY_FUNCTION_NAME } from '../sandbox/allow-list';
import { CLIENT_METHODS } from '../sandbox/capabilities';
import { Logger, logger as rootLogger } from '../logger';

/** Produces code text for a workflow description. */
export interface CodeGenerator {
  generate(description: string, context?: Record<string, unknown>): Promise<string>;
}

/** The chat capability the generator needs. */
export interface ChatCompleter {
  chatCompletion(prompt: string, options?: { model?: string; systemPrompt?: string }): Promise<string>;
}

/** System prompt describing the sandbox contract to the model. */
const SYSTEM_PROMPT = `You write JavaScript workflows that process documents through a document-intelligence API.

CRITICAL: Reply with JavaScript only. No explanation text.

The code must define:
  async function ${ENTRY_FUNCTION_NAME}(userInput) { ... return reportText; }

Available globals (nothing else exists: no require, no process, no fetch, no timers):
- userInput: string typed by the user (may be empty)
- attachedFileIds: array of uploaded file ids, in the order the user attached them
- client: document API, every method returns a Promise:
    search(query, { fileIds, tool }) -> { answer, documents, chunks }
    askQuestion(fileId, question) -> { response, chunks }
    analyzeWithPolling(query, documentIds) -> report text
    chatCompletion(prompt, { systemPrompt }) -> text
    getFile(fileId, { includeContent }) -> { id, filename, status, content }
    getFileChunks(fileId) -> { chunks }
    filterChunks(query, chunkIds, { n }) -> { query, chunks }
    queryChunks(query, { n }) -> { query, chunks }
    waitUntilReady(fileId) -> status
- console.log / console.error for progress messages
- sleep(ms)
- Object, Array, String, Number, Boolean, Math, JSON, Date, RegExp, Map, Set, Promise and the standard Error types

Client errors keep their name (TransportError, NotFoundError, AnalysisError, PollingTimeoutError); catch them to fall back.
Return the final report as a string.`;

const FENCE_PATTERN = /```(?:javascript|js|typescript|ts)?[ \t]*\r?\n([\s\S]*?)```/i;

/** Strip a Markdown code fence around generated code, if present. */
export function extractCode(text: string): string {
  const match = FENCE_PATTERN.exec(text);
  return (match ? match[1] : text).trim();
}

/**
 * Check generated code parses and declares the entry function.
 * Throws CompileError otherwise.
 */
export function validateGeneratedCode(code: string): void {
  try {
    new vm.Script(code, { filename: 'workflow.js' });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CompileError(`Generated code does not compile: ${reason}`);
  }
  if (!new RegExp(`\\b${ENTRY_FUNCTION_NAME}\\b`).test(code)) {
    throw new CompileError(`Generated code must define an async function ${ENTRY_FUNCTION_NAME}(userInput)`);
  }
}

function buildPrompt(description: string, context?: Record<string, unknown>): string {
  const lines = [`Task: ${description.trim()}`];
  if (context && Object.keys(context).length > 0) {
    lines.push('', `Additional context: ${JSON.stringify(context)}`);
  }
  lines.push('', `Only these client methods exist: ${CLIENT_METHODS.join(', ')}.`);
  return lines.join('\n');
}

export interface ChatCodeGeneratorOptions {
  model?: string;
  logger?: Logger;
}

/** Code generator backed by the document service's chat completion endpoint. */
export class ChatCodeGenerator implements CodeGenerator {
  private readonly logger: Logger;

  constructor(
    private readonly chat: ChatCompleter,
    private readonly options: ChatCodeGeneratorOptions = {},
  ) {
    this.logger = (options.logger ?? rootLogger).child({ component: 'code-generator' });
  }

  async generate(description: string, context?: Record<string, unknown>): Promise<string> {
    const raw = await this.chat.chatCompletion(buildPrompt(description, context), {
      model: this.options.model,
      systemPrompt: SYSTEM_PROMPT,
    });
    const code = extractCode(raw);
    validateGeneratedCode(code);
    this.logger.info('Workflow code generated', { chars: code.length });
    return code;
  }
}
