import { ExecutionStatus, startExecutionRecord } from '../../src/domain/execution';
import { createDraftWorkflow } from '../../src/domain/workflow';
import { MemoryKeyValueStore, TimeSource, createMemoryStore } from '../../src/storage/memory-store';
import { createKeyValueStore } from '../../src/storage/store';

class FakeTime implements TimeSource {
  constructor(public current = 1_000) {}

  now(): number {
    return this.current;
  }
}

describe('MemoryKeyValueStore', () => {
  test('expires entries after their TTL', async () => {
    const time = new FakeTime();
    const kv = new MemoryKeyValueStore(time);
    await kv.set('a', '1', 500);
    await kv.set('b', '2');

    time.current += 499;
    expect(await kv.get('a')).toBe('1');
    time.current += 1;
    expect(await kv.get('a')).toBeNull();
    expect(await kv.get('b')).toBe('2');
  });

  test('delete reports whether a live entry was removed', async () => {
    const time = new FakeTime();
    const kv = new MemoryKeyValueStore(time);
    await kv.set('live', 'x', 100);
    await kv.set('stale', 'y', 100);
    time.current += 50;
    expect(await kv.delete('live')).toBe(true);
    time.current += 50;
    expect(await kv.delete('stale')).toBe(false);
    expect(await kv.delete('never')).toBe(false);
  });

  test('purgeExpired drops only expired entries', async () => {
    const time = new FakeTime();
    const kv = new MemoryKeyValueStore(time);
    await kv.set('short', '1', 10);
    await kv.set('long', '2', 1_000);
    time.current += 10;

    expect(kv.purgeExpired()).toBe(1);
    expect(kv.size).toBe(1);
  });
});

describe('key-value repositories', () => {
  test('workflows round-trip without aliasing stored state', async () => {
    const store = createMemoryStore();
    const workflow = createDraftWorkflow({ description: 'Extract totals', context: { currency: 'EUR' } });
    await store.workflows.save(workflow);

    const loaded = await store.workflows.getById(workflow.id);
    expect(loaded).toEqual(workflow);
    if (loaded?.context) loaded.context.currency = 'USD';
    expect((await store.workflows.getById(workflow.id))?.context).toEqual({ currency: 'EUR' });
  });

  test('records disappear after the configured TTL', async () => {
    const time = new FakeTime();
    const store = createMemoryStore({ ttlMs: 1_000, time });
    const record = startExecutionRecord('wf_1', { userInput: '', attachedFileIds: ['a', 'b'] });
    await store.executions.save(record);

    expect((await store.executions.getById(record.executionId))?.status).toBe(ExecutionStatus.Running);
    time.current += 1_000;
    expect(await store.executions.getById(record.executionId)).toBeNull();
  });

  test('values that fail validation read back as missing', async () => {
    const kv = new MemoryKeyValueStore();
    const store = createKeyValueStore(kv);
    await kv.set('workflow:wf_bad', JSON.stringify({ id: 'wf_bad', status: 'exploded' }));
    await kv.set('execution:exec_bad', 'not json');

    expect(await store.workflows.getById('wf_bad')).toBeNull();
    expect(await store.executions.getById('exec_bad')).toBeNull();
  });

  test('workflow delete removes the entry', async () => {
    const store = createMemoryStore();
    const workflow = await store.workflows.save(createDraftWorkflow({ description: 'Temp' }));
    expect(await store.workflows.delete(workflow.id)).toBe(true);
    expect(await store.workflows.getById(workflow.id)).toBeNull();
  });
});
