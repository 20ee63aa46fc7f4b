/**
 * Sandboxed executor.
 *
 * Runs one piece of generated code, exactly once, against one set of inputs:
 *
 *   pending -> compiling -> running -> completed | failed | timed_out
 *
 * Containment has three independent parts:
 *   - Namespace: a fresh vm context whose global exposes only the closed
 *     allow-list plus the injected globals. Any other global name throws a
 *     ContainmentError. String and wasm code generation are disabled.
 *   - Time: synchronous evaluation carries the remaining budget as a vm
 *     timeout and the asynchronous remainder races a wall-clock timer. On
 *     expiry the run's AbortController is aborted, which stops in-flight
 *     document service calls and sleeps, and later capability calls fail
 *     with CancelledError.
 *   - Errors: anything thrown by generated code becomes a `failed` outcome.
 *     `run()` never rejects.
 *
 * Limitation: a synchronous loop entered after the entry function's first
 * `await` runs on the host event loop and cannot be pre-empted in process.
 */

import vm from 'vm';
import { Clock, systemClock } from '../domain/async-polling';
import { AppError, CompileError, ExecutionTimeoutError } from '../domain/errors';
import { FileId } from '../domain/execution';
import { SandboxFailure, SandboxOutcome, SandboxState } from '../domain/sandbox-run';
import { DocumentApiClient } from '../documents/client';
import { isRecord } from '../documents/wire';
import { transitionSandboxState } from '../engine/state-machine';
import { Logger, logger as rootLogger } from '../logger';
import {
  ALLOWED_INTRINSICS,
  ENTRY_FUNCTION_NAME,
  INJECTED_GLOBALS,
  INVOKE_HOOK_NAME,
  blockedHostNames,
} from './allow-list';
import { CLIENT_METHODS, createCapabilities, createDispatcher } from './capabilities';
import { DEFAULT_OUTPUT_LIMIT, OutputCapture, truncateTrace } from './output-capture';
import { ENTRY_LOOKUP_SOURCE, SANDBOX_RUNTIME_SOURCE } from './runtime-source';

/** 30 minutes: real analysis jobs can take several minutes each. */
export const DEFAULT_EXECUTION_TIMEOUT_MS = 1_800_000;

const SCRIPT_TIMEOUT_CODE = 'ERR_SCRIPT_EXECUTION_TIMEOUT';
const ERROR_CODE_PATTERN = /^[A-Z_]+\.[A-Z_]+$/;

export interface SandboxExecutorOptions {
  timeoutMs?: number;
  /** Drives the injected `sleep`. */
  clock?: Clock;
  maxOutputChars?: number;
  logger?: Logger;
}

export interface SandboxRunRequest {
  code: string;
  userInput: string;
  /** Passed through in the given order, without deduplication. */
  attachedFileIds: FileId[];
  /** The execution's own client; exposed to generated code as `client`. */
  client: DocumentApiClient;
  /** Aborted when the run times out. Should be the one the client is bound to. */
  controller?: AbortController;
  /** Overrides the executor-wide timeout for this run. */
  timeoutMs?: number;
  onStateChange?: (state: SandboxState) => void;
}

interface PreparedContext {
  context: vm.Context;
  arm: () => void;
}

type OutcomeBody =
  | { state: SandboxState.Completed; result: string }
  | { state: SandboxState.Failed; failure: SandboxFailure }
  | { state: SandboxState.TimedOut; failure: SandboxFailure };

/**
 * Read a property without running accessors. Values thrown inside the
 * sandbox are sandbox objects; plain reads could run generated code outside
 * any timeout.
 */
function readDataProperty(target: object, key: string): unknown {
  let current: object | null = target;
  for (let depth = 0; current !== null && depth < 16; depth++) {
    const descriptor = Object.getOwnPropertyDescriptor(current, key);
    if (descriptor) return 'value' in descriptor ? descriptor.value : undefined;
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}

interface ThrownDescription {
  name: string;
  message: string;
  stack?: string;
  code?: string;
}

function describeThrown(err: unknown): ThrownDescription {
  if (typeof err === 'function' || (typeof err === 'object' && err !== null)) {
    const name = readDataProperty(err, 'name');
    const message = readDataProperty(err, 'message');
    const stack = readDataProperty(err, 'stack');
    const code = readDataProperty(err, 'code');
    return {
      name: typeof name === 'string' ? name : 'Error',
      message: typeof message === 'string' ? message : '',
      stack: typeof stack === 'string' ? stack : undefined,
      code: typeof code === 'string' ? code : undefined,
    };
  }
  return { name: 'Error', message: String(err) };
}

function isScriptTimeout(err: unknown): boolean {
  return typeof err === 'object' && err !== null && readDataProperty(err, 'code') === SCRIPT_TIMEOUT_CODE;
}

function failureCode(name: string, code?: string): string {
  if (name === 'ContainmentError') return 'SANDBOX.CONTAINMENT';
  if (code !== undefined && ERROR_CODE_PATTERN.test(code)) return code;
  return 'SANDBOX.RUNTIME';
}

function toFailure(description: ThrownDescription): SandboxFailure {
  const failure: SandboxFailure = {
    code: failureCode(description.name, description.code),
    name: description.name,
    message: description.message,
  };
  if (description.stack) failure.trace = truncateTrace(description.stack);
  return failure;
}

function appErrorFailure(err: AppError): SandboxFailure {
  return { code: err.code, name: err.name, message: err.message };
}

/** Parse the JSON reply the sandbox runtime delivers when the entry settles. */
function parseCompletion(replyJson: string): OutcomeBody {
  let reply: unknown;
  try {
    reply = JSON.parse(replyJson);
  } catch {
    return {
      state: SandboxState.Failed,
      failure: { code: 'SANDBOX.RUNTIME', name: 'Error', message: 'Unreadable result from generated code' },
    };
  }
  if (isRecord(reply) && reply.ok === true && typeof reply.value === 'string') {
    return { state: SandboxState.Completed, result: reply.value };
  }
  const record = isRecord(reply) ? reply : {};
  return {
    state: SandboxState.Failed,
    failure: toFailure({
      name: typeof record.name === 'string' ? record.name : 'Error',
      message: typeof record.message === 'string' ? record.message : '',
      stack: typeof record.stack === 'string' && record.stack !== '' ? record.stack : undefined,
      code: typeof record.code === 'string' ? record.code : undefined,
    }),
  };
}

function remainingMs(deadline: number): number {
  return Math.max(1, Math.ceil(deadline - Date.now()));
}

export class SandboxExecutor {
  private readonly timeoutMs: number;
  private readonly clock: Clock;
  private readonly maxOutputChars: number;
  private readonly logger: Logger;

  constructor(options: SandboxExecutorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EXECUTION_TIMEOUT_MS;
    this.clock = options.clock ?? systemClock;
    this.maxOutputChars = options.maxOutputChars ?? DEFAULT_OUTPUT_LIMIT;
    this.logger = (options.logger ?? rootLogger).child({ component: 'sandbox' });
  }

  /** Run generated code to a terminal outcome. Never rejects. */
  async run(request: SandboxRunRequest): Promise<SandboxOutcome> {
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    const controller = request.controller ?? new AbortController();
    const capture = new OutputCapture(this.maxOutputChars);
    const startedAt = Date.now();
    const deadline = startedAt + timeoutMs;
    let state = SandboxState.Pending;

    const moveTo = (target: SandboxState): void => {
      const transition = transitionSandboxState(state, target);
      if (!transition.success || transition.newStatus === undefined) {
        this.logger.error('Invalid sandbox transition', { from: state, to: target });
        return;
      }
      state = transition.newStatus;
      request.onStateChange?.(state);
    };

    const finish = (body: OutcomeBody): SandboxOutcome => {
      moveTo(body.state);
      capture.close();
      const elapsedMs = Date.now() - startedAt;
      if (body.state === SandboxState.TimedOut) controller.abort();
      this.logger.info('Sandbox run finished', {
        state: body.state,
        elapsedMs,
        outputTruncated: capture.truncated,
      });
      return { ...body, logs: capture.snapshot(), elapsedMs };
    };

    const timedOut = (): OutcomeBody => ({
      state: SandboxState.TimedOut,
      failure: appErrorFailure(new ExecutionTimeoutError(timeoutMs)),
    });

    moveTo(SandboxState.Compiling);
    let script: vm.Script;
    try {
      script = new vm.Script(request.code, { filename: 'workflow.js' });
    } catch (err) {
      const thrown = describeThrown(err);
      const compileError = new CompileError(`Generated code does not compile: ${thrown.message}`, {
        name: thrown.name,
      });
      const failure = appErrorFailure(compileError);
      if (thrown.stack) failure.trace = truncateTrace(thrown.stack);
      return finish({ state: SandboxState.Failed, failure });
    }

    moveTo(SandboxState.Running);
    let resolveCompletion: (replyJson: string) => void = () => undefined;
    const completion = new Promise<string>((resolve) => {
      resolveCompletion = resolve;
    });

    try {
      const { context, arm } = this.prepareContext(request, controller.signal, capture, (replyJson) =>
        resolveCompletion(replyJson),
      );
      script.runInContext(context, { timeout: remainingMs(deadline) });

      const hasEntry: unknown = vm.runInContext(ENTRY_LOOKUP_SOURCE, context, { timeout: remainingMs(deadline) });
      if (hasEntry !== true) {
        return finish({
          state: SandboxState.Failed,
          failure: appErrorFailure(
            new CompileError(`Generated code must define an async function ${ENTRY_FUNCTION_NAME}(userInput)`),
          ),
        });
      }

      arm();
      vm.runInContext(`void ${INVOKE_HOOK_NAME}();`, context, { timeout: remainingMs(deadline) });
    } catch (err) {
      if (isScriptTimeout(err)) return finish(timedOut());
      return finish({ state: SandboxState.Failed, failure: toFailure(describeThrown(err)) });
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expiry = new Promise<undefined>((resolve) => {
      timer = setTimeout(() => resolve(undefined), remainingMs(deadline));
    });
    const replyJson = await Promise.race([completion, expiry]);
    clearTimeout(timer);

    if (replyJson === undefined) {
      this.logger.warn('Sandbox run timed out', { timeoutMs });
      return finish(timedOut());
    }
    return finish(parseCompletion(replyJson));
  }

  /** Build a fresh context and install the runtime and capabilities into it. */
  private prepareContext(
    request: SandboxRunRequest,
    signal: AbortSignal,
    capture: OutputCapture,
    onComplete: (replyJson: string) => void,
  ): PreparedContext {
    const context = vm.createContext(Object.create(null), {
      name: 'workflow-sandbox',
      codeGeneration: { strings: false, wasm: false },
    });

    const install: unknown = vm.runInContext(SANDBOX_RUNTIME_SOURCE, context, { filename: 'sandbox-runtime.js' });
    if (typeof install !== 'function') {
      throw new Error('Sandbox runtime did not evaluate to an installer');
    }

    const dispatch = createDispatcher(createCapabilities(request.client, this.clock, signal), {
      signal,
      logger: this.logger,
    });
    const print = (stream: unknown, text: unknown): void => {
      if ((stream === 'stdout' || stream === 'stderr') && typeof text === 'string') {
        capture.write(stream, text);
      }
    };
    const complete = (replyJson: unknown): void => {
      if (typeof replyJson === 'string') onComplete(replyJson);
    };

    const config = {
      allowed: ALLOWED_INTRINSICS,
      injected: INJECTED_GLOBALS,
      blocked: blockedHostNames(),
      clientMethods: CLIENT_METHODS,
      invokeHook: INVOKE_HOOK_NAME,
      userInput: request.userInput,
      attachedFileIds: [...request.attachedFileIds],
    };
    const arm: unknown = install(dispatch, print, complete, JSON.stringify(config));
    if (typeof arm !== 'function') {
      throw new Error('Sandbox runtime did not return its invoke hook');
    }
    return { context, arm: () => void arm() };
  }
}
