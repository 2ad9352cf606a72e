import { describe, it, expect } from 'vitest';
import { connectLinesAtIntersections } from '@framestitch/core';
import type { CrossSectionId, Lineage, LineId, Member, MemberGraph } from '@framestitch/core';
import { governingSections, mothersWithoutResults, reduceToMothers } from './reduce.js';
import type { CrossSection } from './types.js';

function catalogue(entries: Array<[CrossSectionId, string]>): Map<CrossSectionId, CrossSection> {
  return new Map(entries.map(([id, name]) => [id, { id, name }]));
}

function steel(entries: Array<[LineId, CrossSectionId]>): Map<LineId, Member> {
  return new Map(
    entries.map(([lineId, crossSectionId]) => [lineId, { lineId, crossSectionId, materialName: 'Steel' }])
  );
}

describe('result reduction', () => {
  const lineage: Pick<Lineage, 'motherToChildren'> = {
    motherToChildren: new Map([
      [1, [3, 4]],
      [2, [5, 6]],
      [7, [7]],
      [8, []],
    ]),
  };

  describe('reduceToMothers', () => {
    it('should fold child values per mother', () => {
      const values = new Map([
        [3, 1.5],
        [4, 2.5],
        [5, 0.8],
      ]);
      const reduced = reduceToMothers(lineage, values, Math.max);

      expect([...reduced.entries()]).toEqual([
        [1, 2.5],
        [2, 0.8],
      ]);
    });

    it('should return nothing when no child has a value', () => {
      expect(reduceToMothers(lineage, new Map<LineId, number>(), Math.max).size).toBe(0);
    });
  });

  describe('governingSections', () => {
    const sections = catalogue([
      [10, 'HEA 200'],
      [11, 'HEA 240'],
      [12, 'RHS 100x50x6'],
      [13, 'HEB 200'],
    ]);

    it('should pick the largest section among analysed children', () => {
      const governing = governingSections(lineage, steel([[3, 10], [4, 11], [5, 12]]), sections);

      expect([...governing.keys()]).toEqual([1, 2]);
      expect(governing.get(1)).toEqual({
        motherId: 1,
        childId: 4,
        crossSection: { id: 11, name: 'HEA 240' },
        size: 240,
      });
      expect(governing.get(2)?.childId).toBe(5);
      expect(governing.get(2)?.size).toBe(6);
    });

    it('should keep the first child on a tie', () => {
      const governing = governingSections(lineage, steel([[3, 10], [4, 13]]), sections);
      expect(governing.get(1)?.childId).toBe(3);
    });

    it('should skip children whose section is not in the catalogue', () => {
      const governing = governingSections(lineage, steel([[3, 99], [4, 10]]), sections);
      expect(governing.get(1)?.childId).toBe(4);
    });
  });

  describe('mothersWithoutResults', () => {
    it('should list mothers with no analysed child', () => {
      expect(mothersWithoutResults(lineage, steel([[3, 10], [6, 10]]))).toEqual([7, 8]);
    });
  });

  describe('after a connect pass', () => {
    it('should reduce child sections onto the crossing diagonals', () => {
      const graph: MemberGraph = {
        nodes: new Map([
          [1, { id: 1, x: 0, y: 0, z: 0 }],
          [2, { id: 2, x: 10, y: 10, z: 0 }],
          [3, { id: 3, x: 0, y: 10, z: 0 }],
          [4, { id: 4, x: 10, y: 0, z: 0 }],
        ]),
        lines: new Map([
          [1, { id: 1, ni: 1, nj: 2 }],
          [2, { id: 2, ni: 3, nj: 4 }],
        ]),
        members: steel([
          [1, 10],
          [2, 10],
        ]),
      };
      const repaired = connectLinesAtIntersections(graph);
      const analysed = steel([
        [3, 10],
        [4, 11],
        [5, 12],
        [6, 12],
      ]);

      const governing = governingSections(repaired, analysed, catalogue([
        [10, 'HEA 200'],
        [11, 'HEA 240'],
        [12, 'RHS 100x50x6'],
      ]));

      expect(governing.get(1)?.crossSection.id).toBe(11);
      expect(governing.get(2)?.childId).toBe(5);
    });
  });
});
