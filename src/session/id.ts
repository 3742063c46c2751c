/**
 * Hierarchical session ids.
 *
 * The ancestry tree lives entirely in the id: children are found by prefix,
 * so no parent keeps a list of its children.
 */

export function parentOf(id: string): string | null {
  const idx = id.lastIndexOf('.');
  return idx === -1 ? null : id.slice(0, idx);
}

export function depthOf(id: string): number {
  return id.split('.').length - 1;
}

export function childId(parentId: string | null, index: number): string {
  return parentId === null ? String(index) : `${parentId}.${index}`;
}

export function isDescendantOf(id: string, ancestorId: string): boolean {
  return id.startsWith(`${ancestorId}.`);
}

/**
 * Index of a direct child of `parentId` (or of a root when null), or null
 * when `id` is not a direct child.
 */
export function childIndex(id: string, parentId: string | null): number | null {
  if (parentOf(id) !== parentId) {
    return null;
  }
  const suffix = parentId === null ? id : id.slice(parentId.length + 1);
  return Number.parseInt(suffix, 10);
}

/** Ascending order, numeric per segment ("0.9" < "0.10") */
export function compareSessionIds(a: string, b: string): number {
  const left = a.split('.').map(Number);
  const right = b.split('.').map(Number);
  const len = Math.min(left.length, right.length);
  for (let i = 0; i < len; i++) {
    if (left[i] !== right[i]) {
      return left[i] - right[i];
    }
  }
  return left.length - right.length;
}

/** Deepest first, so a subtree can be torn down leaves-first */
export function compareDeepestFirst(a: string, b: string): number {
  return depthOf(b) - depthOf(a) || compareSessionIds(a, b);
}

export function tmuxSessionName(id: string): string {
  return `sctl-${id.replace(/\./g, '-')}`;
}
