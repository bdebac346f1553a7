import { describe, it, expect, beforeEach } from 'vitest';
import { HierarchyQueryEngine } from '../hierarchy.js';
import { InMemoryDivisionRepository } from './memoryRepository.js';

/*
 * HQ(1, sort 10)
 *   OPS(2, sort 20) > LOG(4)
 *   ADM(3, sort 10) > HR(5, sort 10), OLD(6, sort 5, deleted)
 * FIN(7, sort 5)
 * ARC(8, sort 1, deleted)
 * TMP(9, sort 30, inactive)
 */
let repository: InMemoryDivisionRepository;
let hierarchy: HierarchyQueryEngine;

beforeEach(() => {
  repository = new InMemoryDivisionRepository();
  repository.seed({ id: 1, code: 'HQ', name: 'Headquarters', sortOrder: 10 });
  repository.seed({ id: 2, code: 'OPS', name: 'Operations', parentId: 1, sortOrder: 20 });
  repository.seed({ id: 3, code: 'ADM', name: 'Administration', parentId: 1, sortOrder: 10 });
  repository.seed({ id: 4, code: 'LOG', name: 'Logistics', parentId: 2, sortOrder: 10 });
  repository.seed({ id: 5, code: 'HR', name: 'Human Resources', parentId: 3, sortOrder: 10 });
  repository.seed({ id: 6, code: 'OLD', name: 'Old Unit', parentId: 3, sortOrder: 5, isDeleted: true });
  repository.seed({ id: 7, code: 'FIN', name: 'Finance', sortOrder: 5 });
  repository.seed({ id: 8, code: 'ARC', name: 'Archive', sortOrder: 1, isDeleted: true });
  repository.seed({ id: 9, code: 'TMP', name: 'Temporary', sortOrder: 30, isActive: false });
  hierarchy = new HierarchyQueryEngine(repository);
});

describe('getChildren', () => {
  it('returns live direct children in sort order', async () => {
    const children = await hierarchy.getChildren(1);
    expect(children.map(d => d.id)).toEqual([3, 2]);
  });

  it('includes soft-deleted children on request', async () => {
    const children = await hierarchy.getChildren(3, true);
    expect(children.map(d => d.id)).toEqual([6, 5]);
  });

  it('returns an empty list for a leaf', async () => {
    expect(await hierarchy.getChildren(4)).toEqual([]);
  });
});

describe('getHierarchyTree', () => {
  it('returns the root followed by its descendants depth first', async () => {
    const tree = await hierarchy.getHierarchyTree(1);
    expect(tree.map(d => d.id)).toEqual([1, 3, 5, 2, 4]);
  });

  it('places every parent before its children', async () => {
    const tree = await hierarchy.getHierarchyTree(1);
    const position = new Map(tree.map((d, index) => [d.id, index]));

    for (const division of tree.slice(1)) {
      expect(division.parentId).not.toBeNull();
      expect(position.get(division.parentId ?? -1)).toBeLessThan(position.get(division.id) ?? -1);
    }
  });

  it('lists only the top level when no root is given', async () => {
    const tree = await hierarchy.getHierarchyTree();
    expect(tree.map(d => d.id)).toEqual([7, 1, 9]);
  });

  it('treats root id 0 like no root', async () => {
    const tree = await hierarchy.getHierarchyTree(0);
    expect(tree.map(d => d.id)).toEqual([7, 1, 9]);
  });

  it('returns an empty list for an unknown root', async () => {
    expect(await hierarchy.getHierarchyTree(99)).toEqual([]);
  });

  it('returns an empty list for a soft-deleted root', async () => {
    expect(await hierarchy.getHierarchyTree(8)).toEqual([]);
  });

  it('stops on a stored loop', async () => {
    repository.seed({ id: 20, code: 'X', name: 'X', parentId: 21 });
    repository.seed({ id: 21, code: 'Y', name: 'Y', parentId: 20 });

    const tree = await hierarchy.getHierarchyTree(20);
    expect(tree.map(d => d.id)).toEqual([20, 21]);
  });
});

describe('getAvailableCodes', () => {
  it('lists codes of active, live divisions in order', async () => {
    expect(await hierarchy.getAvailableCodes()).toEqual(['ADM', 'FIN', 'HQ', 'HR', 'LOG', 'OPS']);
  });

  it('filters by upper-cased prefix', async () => {
    expect(await hierarchy.getAvailableCodes('h')).toEqual(['HQ', 'HR']);
  });

  it('returns an empty list when nothing matches', async () => {
    expect(await hierarchy.getAvailableCodes('ZZ')).toEqual([]);
  });
});
