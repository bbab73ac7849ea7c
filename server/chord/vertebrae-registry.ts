/**
 * Vertebrae registry
 * Ordered, deduplicated set of vertebra identifiers to cut the chord against.
 */

import { VERTEBRAE_GROUP_NAMES, type VertebraeGroup } from '@shared/schema';
import { UnknownGroupError } from './errors';

const VERTEBRAE_GROUPS: Record<VertebraeGroup, readonly string[]> = {
  cervical: ['C1', 'C2', 'C3', 'C4', 'C5', 'C6', 'C7'],
  thorax: ['T1', 'T2', 'T3', 'T4', 'T5', 'T6', 'T7', 'T8', 'T9', 'T10', 'T11', 'T12'],
  lumbar: ['L1', 'L2', 'L3', 'L4', 'L5'],
};

export function isVertebraeGroup(name: string): name is VertebraeGroup {
  return VERTEBRAE_GROUP_NAMES.some(group => group === name);
}

export class VertebraeRegistry {
  private readonly entries = new Set<string>();

  static groups(): VertebraeGroup[] {
    return [...VERTEBRAE_GROUP_NAMES];
  }

  static groupMembers(group: string): string[] {
    if (!isVertebraeGroup(group)) {
      throw new UnknownGroupError(group, VERTEBRAE_GROUP_NAMES);
    }
    return [...VERTEBRAE_GROUPS[group]];
  }

  get size(): number {
    return this.entries.size;
  }

  has(vertebra: string): boolean {
    return this.entries.has(vertebra);
  }

  add(vertebra: string): void {
    // Set keeps first-insertion order and ignores repeats
    this.entries.add(vertebra);
  }

  addGroup(group: string): void {
    for (const vertebra of VertebraeRegistry.groupMembers(group)) {
      this.add(vertebra);
    }
  }

  clear(): void {
    this.entries.clear();
  }

  list(): string[] {
    return [...this.entries];
  }
}
