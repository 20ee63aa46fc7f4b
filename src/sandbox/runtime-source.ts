/**
 * Source of the runtime installed inside every sandbox context.
 *
 * It runs before generated code, captures the intrinsics it needs, replaces
 * every non-allowed global with a throwing accessor and installs the
 * injected globals. Host functions reach it only as arguments of the install
 * function and stay in its closure. Everything it hands back to the host is
 * a primitive or a function defined here.
 *
 * Install signature:
 *   install(dispatch, print, complete, configJson) -> arm
 *     dispatch(op, argsJson, done)  host; later calls done(replyJson)
 *     print(stream, text)           host; stream is 'stdout' | 'stderr'
 *     complete(resultJson)          host; called once when the entry settles
 *     arm()                         enables the invoke hook for one read
 *
 * Kept as plain source text so it is evaluated inside the context realm and
 * never instrumented or transpiled by host tooling.
 */

import { ENTRY_FUNCTION_NAME } from './allow-list';

export const SANDBOX_RUNTIME_SOURCE = `(function installSandboxRuntime(dispatch, print, complete, configJson) {
  'use strict';
  const g = globalThis;
  const parse = JSON.parse;
  const stringify = JSON.stringify;
  const defineProperty = Object.defineProperty;
  const getOwnPropertyNames = Object.getOwnPropertyNames;
  const getOwnPropertyDescriptor = Object.getOwnPropertyDescriptor;
  const freeze = Object.freeze;
  const createObject = Object.create;
  const PromiseCtor = Promise;
  const ErrorCtor = Error;
  const StringCtor = String;

  const config = parse(configJson);
  const invokeHook = config.invokeHook;

  class ContainmentError extends ErrorCtor {}
  defineProperty(ContainmentError.prototype, 'name', { value: 'ContainmentError', writable: true, configurable: true });

  function containment(name) {
    return new ContainmentError('"' + name + '" is not available in the workflow sandbox');
  }

  function block(name) {
    defineProperty(g, name, {
      get: function () { throw containment(name); },
      set: function () { throw containment(name); },
      enumerable: false,
      configurable: true,
    });
  }

  const exempt = createObject(null);
  for (const name of config.allowed) exempt[name] = true;
  for (const name of config.injected) exempt[name] = true;
  exempt[invokeHook] = true;

  // Stack trace formatting hooks are read off the realm's Error binding.
  defineProperty(ErrorCtor, 'prepareStackTrace', { value: undefined, writable: false, configurable: false });
  defineProperty(g, 'Error', { value: ErrorCtor, writable: false, configurable: false });

  for (const name of getOwnPropertyNames(g)) {
    if (exempt[name] === true) continue;
    const descriptor = getOwnPropertyDescriptor(g, name);
    if (descriptor !== undefined && descriptor.configurable) block(name);
  }
  for (const name of config.blocked) {
    if (exempt[name] !== true && getOwnPropertyDescriptor(g, name) === undefined) block(name);
  }

  function formatValue(value) {
    try {
      if (typeof value === 'string') return value;
      if (value instanceof ErrorCtor) {
        return typeof value.stack === 'string' ? value.stack : StringCtor(value);
      }
      if (value !== null && typeof value === 'object') {
        let text;
        try {
          text = stringify(value);
        } catch (err) {
          text = undefined;
        }
        if (typeof text === 'string') return text;
      }
      return StringCtor(value);
    } catch (err) {
      return '[unprintable value]';
    }
  }

  function writer(stream) {
    return function () {
      let line = '';
      for (let i = 0; i < arguments.length; i++) {
        line += (i > 0 ? ' ' : '') + formatValue(arguments[i]);
      }
      print(stream, line);
    };
  }

  function toError(reply) {
    const err = new ErrorCtor(StringCtor(reply.message));
    defineProperty(err, 'name', { value: StringCtor(reply.name), writable: true, configurable: true });
    if (typeof reply.code === 'string') {
      defineProperty(err, 'code', { value: reply.code, writable: true, configurable: true, enumerable: true });
    }
    return err;
  }

  function call(op, args) {
    return new PromiseCtor(function (resolve, reject) {
      const argsJson = stringify(args);
      dispatch(op, argsJson, function (replyJson) {
        let reply;
        try {
          reply = parse(replyJson);
        } catch (err) {
          reject(err);
          return;
        }
        if (reply.ok === true) resolve(reply.value);
        else reject(toError(reply));
      });
    });
  }

  const clientObject = {};
  for (const method of config.clientMethods) {
    defineProperty(clientObject, method, {
      value: function () {
        const args = [];
        for (let i = 0; i < arguments.length; i++) args[i] = arguments[i];
        return call('client.' + method, args);
      },
      enumerable: true,
    });
  }

  function sleep(ms) {
    return call('sleep', [ms]);
  }

  const consoleObject = freeze({
    log: writer('stdout'),
    info: writer('stdout'),
    debug: writer('stdout'),
    warn: writer('stderr'),
    error: writer('stderr'),
  });

  function inject(name, value) {
    defineProperty(g, name, { value: value, writable: false, enumerable: false, configurable: false });
  }
  inject('client', freeze(clientObject));
  inject('userInput', config.userInput);
  inject('attachedFileIds', config.attachedFileIds);
  inject('console', consoleObject);
  inject('sleep', sleep);

  function coerce(value) {
    if (value === null || value === undefined) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'object') {
      let text;
      try {
        text = stringify(value);
      } catch (err) {
        text = undefined;
      }
      if (typeof text === 'string') return text;
    }
    return StringCtor(value);
  }

  function describe(err) {
    const reply = { ok: false, name: 'Error', message: '', stack: '' };
    try {
      if (err !== null && (typeof err === 'object' || typeof err === 'function')) {
        if (err.name !== undefined) reply.name = StringCtor(err.name);
        if (err.message !== undefined) reply.message = StringCtor(err.message);
        if (typeof err.stack === 'string') reply.stack = err.stack;
        if (typeof err.code === 'string') reply.code = err.code;
      } else {
        reply.message = StringCtor(err);
      }
    } catch (readErr) {
      reply.message = 'Unreadable error value';
    }
    return reply;
  }

  async function invoke() {
    let reply;
    try {
      const value = await ${ENTRY_FUNCTION_NAME}(config.userInput);
      reply = { ok: true, value: coerce(value) };
    } catch (err) {
      reply = describe(err);
    }
    complete(stringify(reply));
  }

  let armed = false;
  defineProperty(g, invokeHook, {
    get: function () {
      if (!armed) throw containment(invokeHook);
      armed = false;
      return invoke;
    },
    set: function () { throw containment(invokeHook); },
    enumerable: false,
    configurable: false,
  });

  return function arm() {
    armed = true;
  };
})`;

/** Evaluates to true when generated code defined the entry function. */
export const ENTRY_LOOKUP_SOURCE = `typeof ${ENTRY_FUNCTION_NAME} === 'function'`;
