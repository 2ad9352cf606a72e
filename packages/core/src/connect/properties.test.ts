import { describe, it, expect } from 'vitest';
import { connectLinesAtIntersections } from './connectLines.js';
import { verifyLineage } from './lineage.js';
import type { MemberGraph } from '../graph/types.js';
import { crossingDiagonals, makeGraph } from '../testing/fixtures.js';

/**
 * Small frame: a grid of two beams and two girders plus a brace drawn over
 * part of the first beam
 */
function frame(): MemberGraph {
  return makeGraph(
    [
      [1, 0, 0, 3],
      [2, 12, 0, 3],
      [3, 0, 6, 3],
      [4, 12, 6, 3],
      [5, 4, -2, 3],
      [6, 4, 8, 3],
      [7, 8, -2, 3],
      [8, 8, 8, 3],
      [9, 1, 0, 3],
      [10, 3, 0, 3],
    ],
    [
      [1, 1, 2],
      [2, 3, 4],
      [3, 5, 6],
      [4, 7, 8],
      [5, 9, 10],
    ],
    [
      [1, 11, 'Steel'],
      [2, 11, 'Steel'],
      [3, 12, 'Concrete'],
      [4, 12, 'Concrete'],
      [5, 13, 'Steel'],
    ]
  );
}

describe('connect properties', () => {
  describe('coverage and partition', () => {
    it.each([
      ['crossing diagonals', crossingDiagonals()],
      ['frame', frame()],
    ])('should give every line exactly one mother (%s)', (_name, graph) => {
      const result = connectLinesAtIntersections(graph);

      expect(verifyLineage(result, graph.lines, result.lines)).toEqual([]);
      for (const lineId of graph.lines.keys()) {
        expect(result.motherToChildren.has(lineId)).toBe(true);
      }
      for (const lineId of result.lines.keys()) {
        expect(result.childToMother.has(lineId)).toBe(true);
      }
    });
  });

  describe('idempotence', () => {
    it('should leave an already connected graph as it is', () => {
      const once = connectLinesAtIntersections(crossingDiagonals());
      const twice = connectLinesAtIntersections(once);

      expect(twice.nodes.size).toBe(once.nodes.size);
      expect([...twice.lines.values()]).toEqual([...once.lines.values()]);
      expect([...twice.members.values()]).toEqual([...once.members.values()]);
      for (const lineId of once.lines.keys()) {
        expect(twice.motherToChildren.get(lineId)).toEqual([lineId]);
        expect(twice.childToMother.get(lineId)).toBe(lineId);
      }
    });
  });

  describe('endpoint touch', () => {
    it('should not split lines that only share an endpoint', () => {
      const graph = makeGraph(
        [
          [1, 0, 0, 0],
          [2, 10, 0, 0],
          [3, 10, 10, 0],
        ],
        [
          [1, 1, 2],
          [2, 2, 3],
        ]
      );
      const result = connectLinesAtIntersections(graph);

      expect(result.nodes.size).toBe(3);
      expect([...result.lines.values()]).toEqual([...graph.lines.values()]);
      expect(result.motherToChildren.get(1)).toEqual([1]);
      expect(result.motherToChildren.get(2)).toEqual([2]);
    });
  });

  describe('elevation grouping', () => {
    it('should ignore crossings at different elevations', () => {
      const result = connectLinesAtIntersections(crossingDiagonals(0.002), { tol: 1e-4 });

      expect(result.nodes.size).toBe(4);
      expect([...result.lines.keys()]).toEqual([1, 2]);
      expect(result.motherToChildren.get(1)).toEqual([1]);
      expect(result.motherToChildren.get(2)).toEqual([2]);
    });

    it('should split lines whose elevations differ within tolerance', () => {
      const result = connectLinesAtIntersections(crossingDiagonals(0.0005), { tol: 1e-4 });

      const node = result.nodes.get(5);
      expect(node?.x).toBe(5);
      expect(node?.y).toBe(5);
      expect(node?.z).toBeCloseTo(0.00025, 12);
      expect(result.motherToChildren.get(1)).toEqual([3, 4]);
    });

    it('should honour an explicit elevation tolerance', () => {
      const result = connectLinesAtIntersections(crossingDiagonals(0.0005), {
        tol: 1e-4,
        elevationTol: 1e-4,
      });
      expect([...result.lines.keys()]).toEqual([1, 2]);
    });
  });

  describe('attribute propagation', () => {
    it('should copy the mother member onto every child', () => {
      const graph = frame();
      const result = connectLinesAtIntersections(graph);

      for (const [childId, motherId] of result.childToMother) {
        if (graph.lines.has(childId)) continue;
        const mother = graph.members.get(motherId);
        const child = result.members.get(childId);
        expect(child?.crossSectionId).toBe(mother?.crossSectionId);
        expect(child?.materialName).toBe(mother?.materialName);
      }
      expect(result.members.size).toBe(result.lines.size);
    });

    it('should not invent members for lines that had none', () => {
      const graph = makeGraph(crossingDiagonalsNodes(), [
        [1, 1, 2],
        [2, 3, 4],
      ]);
      const result = connectLinesAtIntersections(graph);
      expect(result.lines.size).toBe(4);
      expect(result.members.size).toBe(0);
    });
  });

  describe('augmentation', () => {
    it('should adopt a collinear sub-segment without adding nodes or lines', () => {
      const graph = makeGraph(
        [
          [1, 0, 0, 0],
          [2, 10, 0, 0],
          [3, 2, 0, 0],
          [4, 6, 0, 0],
        ],
        [
          [1, 1, 2],
          [2, 3, 4],
        ],
        [
          [1, 7, 'Steel'],
          [2, 9, 'Steel'],
        ]
      );
      const result = connectLinesAtIntersections(graph);

      expect(result.nodes.size).toBe(graph.nodes.size);
      expect(result.lines.size).toBe(graph.lines.size);
      expect([...result.lines.values()]).toEqual([...graph.lines.values()]);
      expect([...result.members.values()]).toEqual([...graph.members.values()]);
      expect(result.motherToChildren.get(1)).toEqual([1, 2]);
      expect(result.motherToChildren.get(2)).toEqual([]);
      expect(result.childToMother.get(2)).toBe(1);
    });

    it('should attach the brace without changing its geometry or member', () => {
      const graph = frame();
      const result = connectLinesAtIntersections(graph);

      expect(result.childToMother.get(5)).toBe(1);
      expect(result.motherToChildren.get(5)).toEqual([]);
      expect(result.lines.get(5)).toEqual({ id: 5, ni: 9, nj: 10 });
      expect(result.members.get(5)).toEqual({ lineId: 5, crossSectionId: 13, materialName: 'Steel' });
    });
  });
});

function crossingDiagonalsNodes(): Array<[number, number, number, number]> {
  return [
    [1, 0, 0, 0],
    [2, 10, 10, 0],
    [3, 0, 10, 0],
    [4, 10, 0, 0],
  ];
}
