import { describe, it, expect } from 'vitest';
import { collectIntersections, initSplitLists } from './collectIntersections.js';
import { cloneGraph } from '../graph/tables.js';
import { IdAllocator } from '../graph/idAllocator.js';
import { GraphContractError } from '../graph/errors.js';
import { createNumericContext } from '../num/tolerance.js';
import { crossingDiagonals, makeGraph } from '../testing/fixtures.js';

describe('collectIntersections', () => {
  const ctx = createNumericContext({ length: 1e-6 });

  it('should seed split lists with both endpoints', () => {
    const splits = initSplitLists(crossingDiagonals().lines);
    expect(splits.get(2)).toEqual([
      { t: 0, nodeId: 3 },
      { t: 1, nodeId: 4 },
    ]);
  });

  it('should add a shared node at a crossing', () => {
    const work = cloneGraph(crossingDiagonals());
    const splits = initSplitLists(work.lines);
    const stats = collectIntersections(work.nodes, work.lines, splits, ctx, IdAllocator.forGraph(work));

    expect(stats).toEqual({ pairsTested: 1, hits: 1, nodesCreated: 1 });
    expect(work.nodes.get(5)).toEqual({ id: 5, x: 5, y: 5, z: 0 });
    expect(splits.get(1)?.[2]).toEqual({ t: 0.5, nodeId: 5 });
    expect(splits.get(2)?.[2]).toEqual({ t: 0.5, nodeId: 5 });
  });

  it('should reuse one node where three lines meet', () => {
    const work = cloneGraph(
      makeGraph(
        [
          [1, 0, 0, 0],
          [2, 10, 10, 0],
          [3, 0, 10, 0],
          [4, 10, 0, 0],
          [5, 5, 0, 0],
          [6, 5, 10, 0],
        ],
        [
          [1, 1, 2],
          [2, 3, 4],
          [3, 5, 6],
        ]
      )
    );
    const splits = initSplitLists(work.lines);
    const stats = collectIntersections(work.nodes, work.lines, splits, ctx, IdAllocator.forGraph(work));

    expect(stats.hits).toBe(3);
    expect(stats.nodesCreated).toBe(1);
    expect(work.nodes.size).toBe(7);
    for (const id of [1, 2, 3]) {
      expect(splits.get(id)?.map((p) => p.nodeId)).toEqual(expect.arrayContaining([7]));
    }
  });

  it('should skip pairs on different stories', () => {
    const work = cloneGraph(crossingDiagonals(3));
    const splits = initSplitLists(work.lines);
    const stats = collectIntersections(work.nodes, work.lines, splits, ctx, IdAllocator.forGraph(work));
    expect(stats).toEqual({ pairsTested: 0, hits: 0, nodesCreated: 0 });
    expect(splits.get(1)).toHaveLength(2);
  });

  it('should fail loudly on a dangling node reference', () => {
    const work = cloneGraph(makeGraph([[1, 0, 0, 0]], [[1, 1, 2]]));
    expect(() =>
      collectIntersections(work.nodes, work.lines, initSplitLists(work.lines), ctx, IdAllocator.forGraph(work))
    ).toThrow(GraphContractError);
  });
});
