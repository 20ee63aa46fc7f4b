/**
 * Storage layer interfaces.
 *
 * Workflows and execution records persist through a key-value contract with
 * expiry, the shape an external cache such as Redis offers. Repositories on
 * top of it serialize to JSON, so values handed out never alias stored state.
 */

import { ExecutionRecord, isExecutionRecord } from '../domain/execution';
import { Workflow, isWorkflow } from '../domain/workflow';

/** 24 hours. */
export const DEFAULT_RECORD_TTL_MS = 86_400_000;

/** Atomic get/set/expire over string values. Safe for concurrent use. */
export interface KeyValueStore {
  /** Name of the backing technology, reported by the health check. */
  readonly backend: string;
  get(key: string): Promise<string | null>;
  /** Store a value; it disappears after `ttlMs` when given. */
  set(key: string, value: string, ttlMs?: number): Promise<void>;
  delete(key: string): Promise<boolean>;
}

/** Store interface for workflows. */
export interface WorkflowStore {
  save(workflow: Workflow): Promise<Workflow>;
  getById(id: string): Promise<Workflow | null>;
  delete(id: string): Promise<boolean>;
}

/** Store interface for execution records. */
export interface ExecutionStore {
  save(record: ExecutionRecord): Promise<ExecutionRecord>;
  getById(executionId: string): Promise<ExecutionRecord | null>;
}

/** Composite store. */
export interface Store {
  readonly backend: string;
  workflows: WorkflowStore;
  executions: ExecutionStore;
}

export interface KeyValueStoreOptions {
  /** Expiry applied to every write. */
  ttlMs?: number;
}

function parseStored<T>(raw: string | null, guard: (value: unknown) => value is T): T | null {
  if (raw === null) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  return guard(parsed) ? parsed : null;
}

class KeyValueWorkflowStore implements WorkflowStore {
  constructor(
    private readonly kv: KeyValueStore,
    private readonly ttlMs: number,
  ) {}

  async save(workflow: Workflow): Promise<Workflow> {
    const raw = JSON.stringify(workflow);
    await this.kv.set(`workflow:${workflow.id}`, raw, this.ttlMs);
    return parseStored(raw, isWorkflow) ?? workflow;
  }

  async getById(id: string): Promise<Workflow | null> {
    return parseStored(await this.kv.get(`workflow:${id}`), isWorkflow);
  }

  async delete(id: string): Promise<boolean> {
    return this.kv.delete(`workflow:${id}`);
  }
}

class KeyValueExecutionStore implements ExecutionStore {
  constructor(
    private readonly kv: KeyValueStore,
    private readonly ttlMs: number,
  ) {}

  async save(record: ExecutionRecord): Promise<ExecutionRecord> {
    const raw = JSON.stringify(record);
    await this.kv.set(`execution:${record.executionId}`, raw, this.ttlMs);
    return parseStored(raw, isExecutionRecord) ?? record;
  }

  async getById(executionId: string): Promise<ExecutionRecord | null> {
    return parseStored(await this.kv.get(`execution:${executionId}`), isExecutionRecord);
  }
}

/** Build workflow and execution repositories over a key-value store. */
export function createKeyValueStore(kv: KeyValueStore, options: KeyValueStoreOptions = {}): Store {
  const ttlMs = options.ttlMs ?? DEFAULT_RECORD_TTL_MS;
  return {
    backend: kv.backend,
    workflows: new KeyValueWorkflowStore(kv, ttlMs),
    executions: new KeyValueExecutionStore(kv, ttlMs),
  };
}
