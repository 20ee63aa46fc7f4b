/**
 * The closed set of names generated workflow code can resolve.
 *
 * Everything else on the sandbox global, and every name the host process
 * exposes, is replaced with an accessor that throws a ContainmentError.
 */

/** Language intrinsics left reachable inside the sandbox. */
export const ALLOWED_INTRINSICS: readonly string[] = [
  'Object',
  'Array',
  'String',
  'Number',
  'Boolean',
  'Symbol',
  'Math',
  'JSON',
  'Date',
  'RegExp',
  'Map',
  'Set',
  'WeakMap',
  'WeakSet',
  'Promise',
  'Error',
  'TypeError',
  'RangeError',
  'SyntaxError',
  'ReferenceError',
  'URIError',
  'parseInt',
  'parseFloat',
  'isNaN',
  'isFinite',
  'encodeURIComponent',
  'decodeURIComponent',
  'encodeURI',
  'decodeURI',
  'NaN',
  'Infinity',
  'undefined',
];

/** Globals installed for each run. */
export const INJECTED_GLOBALS = ['client', 'userInput', 'attachedFileIds', 'console', 'sleep'] as const;

/**
 * Module-system and host names that never exist on a fresh context but that
 * generated code commonly reaches for.
 */
export const HOST_ONLY_NAMES: readonly string[] = [
  'require',
  'module',
  'exports',
  '__dirname',
  '__filename',
  'process',
  'global',
  'globalThis',
  'Buffer',
  'fetch',
  'setTimeout',
  'setInterval',
  'setImmediate',
  'clearTimeout',
  'clearInterval',
  'clearImmediate',
  'queueMicrotask',
  'structuredClone',
  'eval',
  'Function',
];

/** Name of the one-shot hook the executor uses to start the entry function. */
export const INVOKE_HOOK_NAME = '__invokeWorkflowEntry';

/** Entry function generated code must define. */
export const ENTRY_FUNCTION_NAME = 'executeWorkflow';

/**
 * Names to shadow on the sandbox global: the host's own globals plus the
 * fixed host-only list, minus anything allowed or injected.
 */
export function blockedHostNames(hostGlobal: object = globalThis): string[] {
  const exempt = new Set<string>([...ALLOWED_INTRINSICS, ...INJECTED_GLOBALS, INVOKE_HOOK_NAME]);
  const names = new Set<string>([...Object.getOwnPropertyNames(hostGlobal), ...HOST_ONLY_NAMES]);
  return [...names].filter((name) => !exempt.has(name)).sort();
}
