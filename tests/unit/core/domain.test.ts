import { describe, it, expect } from 'vitest';
import {
  ConfigValue,
  HistoryEntry,
  Priority,
  WorkItemType,
  WorkflowState,
  comparePriority,
  compareState,
  createWorkItem,
  updateWorkItem,
} from '../../../src/core/domain.js';

describe('Domain', () => {
  describe('createWorkItem', () => {
    it('should apply defaults and stamp both timestamps', () => {
      const item = createWorkItem({ id: '7', title: 'Write release notes' }, 1000);

      expect(item).toEqual({
        id: '7',
        title: 'Write release notes',
        description: '',
        type: WorkItemType.TASK,
        priority: Priority.MEDIUM,
        state: WorkflowState.FOUND,
        assignee: undefined,
        reporter: undefined,
        parentId: undefined,
        history: [],
        createdAt: 1000,
        updatedAt: 1000,
      });
      expect(Object.isFrozen(item)).toBe(true);
    });
  });

  describe('updateWorkItem', () => {
    it('should return a new item and leave the original untouched', () => {
      const original = createWorkItem({ id: '7', title: 'Old' }, 1000);
      const updated = updateWorkItem(original, { title: 'New' }, 2000);

      expect(updated.title).toBe('New');
      expect(updated.updatedAt).toBe(2000);
      expect(updated.createdAt).toBe(1000);
      expect(original.title).toBe('Old');
      expect(updated.history).toBe(original.history);
    });

    it('should append a history entry when given', () => {
      const original = createWorkItem({ id: '7', title: 'Old' }, 1000);
      const entry: HistoryEntry = {
        timestamp: 2000,
        type: 'FIELD_CHANGE',
        user: 'system',
        from: 'Old',
        to: 'New',
        field: 'title',
      };

      const updated = updateWorkItem(original, { title: 'New' }, 2000, entry);

      expect(updated.history).toEqual([entry]);
      expect(original.history).toEqual([]);
    });
  });

  describe('ordering', () => {
    it('should rank CRITICAL as most urgent', () => {
      const sorted = [Priority.LOW, Priority.CRITICAL, Priority.MEDIUM, Priority.HIGH].sort(comparePriority);
      expect(sorted).toEqual([Priority.CRITICAL, Priority.HIGH, Priority.MEDIUM, Priority.LOW]);
    });

    it('should order states along the workflow', () => {
      expect(compareState(WorkflowState.FOUND, WorkflowState.DONE)).toBeLessThan(0);
      expect(compareState(WorkflowState.RELEASED, WorkflowState.IN_TEST)).toBeGreaterThan(0);
      expect(compareState(WorkflowState.READY, WorkflowState.READY)).toBe(0);
    });
  });

  describe('ConfigValue', () => {
    it('should tag each value with its kind', () => {
      expect(ConfigValue.string('a')).toEqual({ kind: 'string', value: 'a' });
      expect(ConfigValue.number(3)).toEqual({ kind: 'number', value: 3 });
      expect(ConfigValue.boolean(false)).toEqual({ kind: 'boolean', value: false });
      expect(ConfigValue.identifier('PRJ')).toEqual({ kind: 'identifier', value: 'PRJ' });
    });
  });
});
