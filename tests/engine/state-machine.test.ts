import {
  transitionExecutionStatus,
  transitionSandboxState,
  isTerminalSandboxState,
} from '../../src/engine/state-machine';
import { ExecutionStatus, isTerminalExecutionStatus } from '../../src/domain/execution';
import { SandboxState } from '../../src/domain/sandbox-run';

describe('Execution State Machine', () => {
  test.each([ExecutionStatus.Completed, ExecutionStatus.Failed, ExecutionStatus.Timeout])(
    'valid transition: running -> %s',
    (target) => {
      const result = transitionExecutionStatus(ExecutionStatus.Running, target);
      expect(result).toEqual({ success: true, newStatus: target });
    },
  );

  test('invalid transition: completed -> failed', () => {
    const result = transitionExecutionStatus(ExecutionStatus.Completed, ExecutionStatus.Failed);
    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('EXECUTION.INVALID_TRANSITION');
    expect(result.error?.message).toBe('Invalid execution state transition: completed -> failed');
  });

  test('invalid transition: timeout -> running', () => {
    expect(transitionExecutionStatus(ExecutionStatus.Timeout, ExecutionStatus.Running).success).toBe(false);
  });

  test('terminal status detection', () => {
    expect(isTerminalExecutionStatus(ExecutionStatus.Running)).toBe(false);
    expect(isTerminalExecutionStatus(ExecutionStatus.Completed)).toBe(true);
    expect(isTerminalExecutionStatus(ExecutionStatus.Failed)).toBe(true);
    expect(isTerminalExecutionStatus(ExecutionStatus.Timeout)).toBe(true);
  });
});

describe('Sandbox State Machine', () => {
  test('pending -> compiling -> running -> completed', () => {
    expect(transitionSandboxState(SandboxState.Pending, SandboxState.Compiling).success).toBe(true);
    expect(transitionSandboxState(SandboxState.Compiling, SandboxState.Running).success).toBe(true);
    expect(transitionSandboxState(SandboxState.Running, SandboxState.Completed).success).toBe(true);
  });

  test('compile failures skip running', () => {
    expect(transitionSandboxState(SandboxState.Compiling, SandboxState.Failed).success).toBe(true);
  });

  test('a compiling run cannot time out', () => {
    const result = transitionSandboxState(SandboxState.Compiling, SandboxState.TimedOut);
    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('SANDBOX.INVALID_TRANSITION');
    expect(result.error?.details).toEqual({
      current: 'compiling',
      target: 'timed_out',
      validTargets: ['running', 'failed'],
    });
  });

  test('terminal state detection', () => {
    expect(isTerminalSandboxState(SandboxState.Running)).toBe(false);
    expect(isTerminalSandboxState(SandboxState.Completed)).toBe(true);
    expect(isTerminalSandboxState(SandboxState.Failed)).toBe(true);
    expect(isTerminalSandboxState(SandboxState.TimedOut)).toBe(true);
  });
});
