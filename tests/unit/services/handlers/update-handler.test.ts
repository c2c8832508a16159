import { describe, it, expect, beforeEach } from 'vitest';
import { Priority, WorkflowState } from '../../../../src/core/domain.js';
import { CommandInvocation } from '../../../../src/core/interfaces.js';
import { InMemoryStateStore } from '../../../../src/implementations/state-store.js';
import { BufferedOutputChannel, StagedInputChannel } from '../../../../src/implementations/stream-capture.js';
import { TestLogger } from '../../../../src/implementations/logger.js';
import { TestContext } from '../../../../src/services/test-context.js';
import { UpdateSession } from '../../../../src/services/handlers/update-handler.js';
import { FIXED_NOW, WorkItemFactory, createTestHarness } from '../../../fixtures/factories.js';

const MENU = [
  'Work Item: 101',
  '[1] Title: Fix login redirect',
  '[2] Description: ',
  '[3] Priority: MEDIUM',
  '[4] State: FOUND',
  '[5] Assignee: Unassigned',
  '[0] Cancel',
  '',
  'Enter the number of the field to update: ',
].map(line => `${line}\n`).join('');

describe('update handler', () => {
  let context: TestContext;

  beforeEach(() => {
    ({ context } = createTestHarness());
    context.addWorkItem('101', { id: '101', title: 'Fix login redirect' });
  });

  const runUpdate = (...answers: string[]) => {
    context.stageInput(...answers);
    const result = context.run('wit update', '101');
    if (!result.ok) throw result.error;
    return result.value;
  };

  describe('successful updates', () => {
    it('should consume staged answers in order and update the chosen field', () => {
      const result = runUpdate('2', 'newtitle');

      expect(result.stdout).toBe(`${MENU}Enter new value: \nField updated successfully\n`);
      expect(result.stderr).toBe('');
      expect(result.exitCode).toBe(0);
      expect(context.getWorkItem('101')?.description).toBe('newtitle');
      expect(context.getWorkItem('101')?.title).toBe('Fix login redirect');
    });

    it('should record a history entry attributed to the user role', () => {
      context.setUserRole('qa-lead');
      runUpdate('1', 'Fix logout redirect');

      expect(context.getWorkItem('101')?.history).toEqual([{
        timestamp: FIXED_NOW,
        type: 'FIELD_CHANGE',
        user: 'qa-lead',
        from: 'Fix login redirect',
        to: 'Fix logout redirect',
        field: 'title',
      }]);
    });

    it('should accept a priority in any case and store it upper-cased', () => {
      runUpdate('3', 'high');

      const item = context.getWorkItem('101');
      expect(item?.priority).toBe(Priority.HIGH);
      expect(item?.history[0]).toMatchObject({ type: 'PRIORITY_CHANGE', from: 'MEDIUM', to: 'HIGH' });
    });

    it('should move the item along the workflow', () => {
      runUpdate('4', 'in_progress');

      const item = context.getWorkItem('101');
      expect(item?.state).toBe(WorkflowState.IN_PROGRESS);
      expect(item?.history[0]).toMatchObject({ type: 'STATE_CHANGE', from: 'FOUND', to: 'IN_PROGRESS' });
    });

    it('should record an assignment from nobody as from none', () => {
      runUpdate('5', 'dana');

      const item = context.getWorkItem('101');
      expect(item?.assignee).toBe('dana');
      expect(item?.history[0]).toMatchObject({ type: 'ASSIGNMENT_CHANGE', user: 'system', from: 'none', to: 'dana' });
    });

    it('should resolve the item by id when it is stored under another key', () => {
      context.addWorkItem('login-bug', { id: '300', title: 'Aliased' });
      context.stageInput('1', 'Renamed');

      const result = context.run('wit update 300');
      if (!result.ok) throw result.error;

      expect(result.value.stdout).toContain('Work Item: 300\n');
      expect(context.getWorkItem('login-bug')?.title).toBe('Renamed');
    });
  });

  describe('cancellation', () => {
    it('should cancel on 0 without touching the item', () => {
      const before = context.getWorkItem('101');
      const result = runUpdate('0');

      expect(result.stdout).toBe(`${MENU}Update cancelled\n`);
      expect(result.exitCode).toBe(0);
      expect(context.getWorkItem('101')).toBe(before);
    });

    it('should treat an exhausted queue as cancel', () => {
      const result = runUpdate();

      expect(result.stdout).toBe(`${MENU}Update cancelled\n`);
      expect(result.stderr).toBe('');
    });
  });

  describe('selector validation', () => {
    it.each(['9', 'abc', '-1', '6', '1.5'])('should reject selection %j', (answer) => {
      const before = context.getWorkItem('101');
      const result = runUpdate(answer, 'unused');

      expect(result.stdout).toBe(MENU);
      expect(result.stderr).toBe('Error: Invalid selection\n');
      expect(result.exitCode).toBe(1);
      expect(context.getWorkItem('101')).toBe(before);
    });
  });

  describe('value validation', () => {
    it('should reject an empty value', () => {
      const before = context.getWorkItem('101');
      const result = runUpdate('1', '');

      expect(result.stdout).toBe(`${MENU}Enter new value: \n`);
      expect(result.stderr).toBe('Error: Empty value not allowed\n');
      expect(context.getWorkItem('101')).toBe(before);
    });

    it('should reject a missing value like an empty one', () => {
      const result = runUpdate('1');
      expect(result.stderr).toBe('Error: Empty value not allowed\n');
    });

    it('should reject an unknown priority', () => {
      const result = runUpdate('3', 'urgent');

      expect(result.stderr).toBe('Error: Invalid priority: urgent\n');
      expect(context.getWorkItem('101')?.priority).toBe(Priority.MEDIUM);
    });

    it('should reject an unknown state', () => {
      const result = runUpdate('4', 'archived');
      expect(result.stderr).toBe('Error: Invalid state: archived\n');
    });
  });

  describe('item resolution', () => {
    it('should require an id', () => {
      const result = context.run('wit update');
      if (!result.ok) throw result.error;

      expect(result.value.stdout).toBe('');
      expect(result.value.stderr).toBe('Error: No work item ID provided\n');
    });

    it('should report an unknown id', () => {
      const result = context.run('wit update', '999');
      if (!result.ok) throw result.error;

      expect(result.value.stdout).toBe('');
      expect(result.value.stderr).toBe('Error: Work item not found: 999\n');
      expect(result.value.exitCode).toBe(1);
    });
  });

  it('should not leave unread answers for the next command', () => {
    runUpdate('0', 'leftover');
    const second = runUpdate();

    expect(second.stdout).toBe(`${MENU}Update cancelled\n`);
    expect(context.pendingInput()).toBe(0);
  });
});

describe('UpdateSession', () => {
  const invocation = (answers: string[], logger = new TestLogger()): CommandInvocation => {
    const store = new InMemoryStateStore();
    store.saveWorkItem('101', new WorkItemFactory().withId('101').build());
    return {
      family: 'wit',
      subcommand: 'update',
      args: '101',
      io: { out: new BufferedOutputChannel(), err: new BufferedOutputChannel(), input: new StagedInputChannel(answers) },
      store,
      userRole: 'system',
      now: () => FIXED_NOW,
      newId: () => 'unused',
      logger,
    };
  };

  it('should terminate with the outcome of the walk', () => {
    expect(new UpdateSession(invocation(['1', 'New'])).run()).toEqual({ kind: 'Terminated', outcome: 'success' });
    expect(new UpdateSession(invocation(['0'])).run()).toEqual({ kind: 'Terminated', outcome: 'cancelled' });
    expect(new UpdateSession(invocation(['x'])).run()).toEqual({ kind: 'Terminated', outcome: 'error' });
  });

  it('should log the outcome', () => {
    const logger = new TestLogger();
    new UpdateSession(invocation([], logger)).run();

    expect(logger.logs).toEqual([
      { level: 'debug', message: 'Update session finished', context: { outcome: 'cancelled' } },
    ]);
  });
});
