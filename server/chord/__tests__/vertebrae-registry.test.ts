/**
 * Vertebrae Registry Tests
 *
 * Ordered, duplicate-free vertebra selection and anatomical group expansion.
 */

import { UnknownGroupError } from '../errors';
import { VertebraeRegistry, isVertebraeGroup } from '../vertebrae-registry';

describe('VertebraeRegistry', () => {
  describe('add', () => {
    it('keeps first insertion order', () => {
      const registry = new VertebraeRegistry();
      registry.add('T5');
      registry.add('C1');
      registry.add('L2');
      expect(registry.list()).toEqual(['T5', 'C1', 'L2']);
    });

    it('ignores a vertebra already present', () => {
      const registry = new VertebraeRegistry();
      registry.add('T5');
      registry.add('C1');
      registry.add('T5');
      expect(registry.list()).toEqual(['T5', 'C1']);
      expect(registry.size).toBe(2);
    });
  });

  describe('addGroup', () => {
    it('expands cervical to C1..C7 in order', () => {
      const registry = new VertebraeRegistry();
      registry.addGroup('cervical');
      expect(registry.list()).toEqual(['C1', 'C2', 'C3', 'C4', 'C5', 'C6', 'C7']);
    });

    it('adds no duplicates when a group is added twice', () => {
      const registry = new VertebraeRegistry();
      registry.addGroup('cervical');
      registry.addGroup('cervical');
      expect(registry.list()).toEqual(['C1', 'C2', 'C3', 'C4', 'C5', 'C6', 'C7']);
    });

    it('expands thorax to T1..T12 and lumbar to L1..L5', () => {
      const registry = new VertebraeRegistry();
      registry.addGroup('thorax');
      registry.addGroup('lumbar');
      expect(registry.list()).toEqual([
        'T1', 'T2', 'T3', 'T4', 'T5', 'T6', 'T7', 'T8', 'T9', 'T10', 'T11', 'T12',
        'L1', 'L2', 'L3', 'L4', 'L5',
      ]);
    });

    it('keeps an earlier single vertebra at its original position', () => {
      const registry = new VertebraeRegistry();
      registry.add('L3');
      registry.addGroup('lumbar');
      expect(registry.list()).toEqual(['L3', 'L1', 'L2', 'L4', 'L5']);
    });

    it('rejects an unknown group and leaves the registry unchanged', () => {
      const registry = new VertebraeRegistry();
      registry.add('C1');
      expect(() => registry.addGroup('sacral')).toThrow(UnknownGroupError);
      expect(registry.list()).toEqual(['C1']);
    });

    it('names the known groups in the error', () => {
      const registry = new VertebraeRegistry();
      expect(() => registry.addGroup('Cervical')).toThrow(
        'Unknown vertebrae group "Cervical" (expected one of: cervical, thorax, lumbar)',
      );
    });
  });

  describe('clear and list', () => {
    it('empties the registry', () => {
      const registry = new VertebraeRegistry();
      registry.addGroup('lumbar');
      registry.clear();
      expect(registry.list()).toEqual([]);
      expect(registry.has('L1')).toBe(false);
    });

    it('returns a copy that does not alias internal state', () => {
      const registry = new VertebraeRegistry();
      registry.add('T1');
      const listed = registry.list();
      listed.push('T2');
      expect(registry.list()).toEqual(['T1']);
    });
  });

  describe('groups', () => {
    it('lists group names and members', () => {
      expect(VertebraeRegistry.groups()).toEqual(['cervical', 'thorax', 'lumbar']);
      expect(VertebraeRegistry.groupMembers('lumbar')).toEqual(['L1', 'L2', 'L3', 'L4', 'L5']);
      expect(isVertebraeGroup('thorax')).toBe(true);
      expect(isVertebraeGroup('toString')).toBe(false);
    });
  });
});
