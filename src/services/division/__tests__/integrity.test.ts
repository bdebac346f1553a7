import { describe, it, expect, beforeEach } from 'vitest';
import { IntegrityEngine } from '../integrity.js';
import { HierarchyCorruptionError } from '../errors.js';
import { InMemoryDivisionRepository } from './memoryRepository.js';

// HQ(1) > OPS(2) > LOG(3); FIN(4) is a separate root; OLD(5) is soft-deleted
let repository: InMemoryDivisionRepository;
let integrity: IntegrityEngine;

beforeEach(() => {
  repository = new InMemoryDivisionRepository();
  repository.seed({ id: 1, code: 'HQ', name: 'Headquarters' });
  repository.seed({ id: 2, code: 'OPS', name: 'Operations', parentId: 1 });
  repository.seed({ id: 3, code: 'LOG', name: 'Logistics', parentId: 2 });
  repository.seed({ id: 4, code: 'FIN', name: 'Finance' });
  repository.seed({ id: 5, code: 'OLD', name: 'Archive', isDeleted: true });
  integrity = new IntegrityEngine(repository);
});

describe('checkCodeAvailable', () => {
  it('reports a code held by a live division', async () => {
    expect(await integrity.checkCodeAvailable('OPS')).toEqual({
      kind: 'CodeExists',
      message: "Division with code 'OPS' already exists",
      code: 'OPS',
    });
  });

  it('ignores the division being updated', async () => {
    expect(await integrity.checkCodeAvailable('OPS', 2)).toBeNull();
  });

  it('ignores soft-deleted holders', async () => {
    expect(await integrity.checkCodeAvailable('OLD')).toBeNull();
  });

  it('accepts an unused code', async () => {
    expect(await integrity.checkCodeAvailable('NEW')).toBeNull();
  });
});

describe('checkParentExists', () => {
  it('reports a missing parent', async () => {
    expect(await integrity.checkParentExists(99)).toEqual({
      kind: 'ParentNotFound',
      message: 'Parent division with ID 99 not found',
      parentId: 99,
    });
  });

  it('accepts a soft-deleted parent', async () => {
    expect(await integrity.checkParentExists(5)).toBeNull();
  });
});

describe('checkParentAssignment', () => {
  it('rejects a division as its own parent', async () => {
    const error = await integrity.checkParentAssignment(2, 2);
    expect(error?.kind).toBe('SelfParent');
    expect(error?.message).toBe('Division cannot be its own parent');
  });

  it('accepts moving to the root', async () => {
    expect(await integrity.checkParentAssignment(3, null)).toBeNull();
  });

  it('rejects a missing parent', async () => {
    expect((await integrity.checkParentAssignment(2, 99))?.kind).toBe('ParentNotFound');
  });

  it('rejects hanging a division under its own descendant', async () => {
    expect(await integrity.checkParentAssignment(1, 3)).toEqual({
      kind: 'CircularReference',
      message: 'Cannot create circular parent-child relationship',
      divisionId: 1,
      parentId: 3,
    });
  });

  it('accepts an unrelated parent', async () => {
    expect(await integrity.checkParentAssignment(3, 4)).toBeNull();
  });
});

describe('wouldCreateCycle', () => {
  it('detects an ancestor several levels up', async () => {
    expect(await integrity.wouldCreateCycle(1, 3)).toBe(true);
  });

  it('returns false for a separate branch', async () => {
    expect(await integrity.wouldCreateCycle(4, 3)).toBe(false);
  });

  it('treats a dangling parent link as a root', async () => {
    repository.seed({ id: 6, code: 'ORPHAN', name: 'Orphan', parentId: 77 });
    expect(await integrity.wouldCreateCycle(1, 6)).toBe(false);
  });

  it('throws on a stored loop instead of walking forever', async () => {
    repository.seed({ id: 10, code: 'X', name: 'X', parentId: 11 });
    repository.seed({ id: 11, code: 'Y', name: 'Y', parentId: 10 });

    await expect(integrity.wouldCreateCycle(1, 10)).rejects.toBeInstanceOf(HierarchyCorruptionError);
  });
});

describe('checkDeletable', () => {
  it('reports the number of live children', async () => {
    repository.seed({ id: 6, code: 'AUD', name: 'Audit', parentId: 1 });

    expect(await integrity.checkDeletable(1)).toEqual({
      kind: 'HasChildren',
      message: 'Cannot delete division with 2 child divisions',
      childrenCount: 2,
    });
  });

  it('uses the singular for one child', async () => {
    expect((await integrity.checkDeletable(2))?.message).toBe('Cannot delete division with 1 child division');
  });

  it('accepts a leaf', async () => {
    expect(await integrity.checkDeletable(3)).toBeNull();
  });

  it('does not count soft-deleted children', async () => {
    repository.seed({ id: 6, code: 'GONE', name: 'Gone', parentId: 4, isDeleted: true });
    expect(await integrity.checkDeletable(4)).toBeNull();
  });
});
