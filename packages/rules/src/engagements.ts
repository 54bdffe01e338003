// packages/rules/src/engagements.ts

import { Geometry, unitsCollide } from "./geometry";
import { Engagement, GameState } from "./model";
import { listUnits } from "./shared/stateUtils";

// Union-find over unit ids; parent[i] === i marks a root
export class UnionFind {
  private readonly parent: number[];
  private readonly rank: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
    this.rank = new Array<number>(size).fill(0);
  }

  find(x: number): number {
    let root = x;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }
    // path compression
    let cur = x;
    while (this.parent[cur] !== root) {
      const next = this.parent[cur];
      this.parent[cur] = root;
      cur = next;
    }
    return root;
  }

  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;
    if (this.rank[ra] < this.rank[rb]) {
      this.parent[ra] = rb;
    } else if (this.rank[ra] > this.rank[rb]) {
      this.parent[rb] = ra;
    } else {
      this.parent[rb] = ra;
      this.rank[ra] += 1;
    }
  }
}

/**
 * Groups live units into engagements: connected components of the
 * "currently colliding" relation with at least two members.
 * Members are sorted by id and engagements by their lowest member,
 * so the result does not depend on pair evaluation order.
 */
export function findEngagements(
  state: GameState,
  geometry: Geometry
): Engagement[] {
  const units = listUnits(state);
  const uf = new UnionFind(state.nextUnitId);

  for (let i = 0; i < units.length; i += 1) {
    for (let j = i + 1; j < units.length; j += 1) {
      if (unitsCollide(geometry, units[i], units[j])) {
        uf.union(units[i].id, units[j].id);
      }
    }
  }

  const groups = new Map<number, number[]>();
  for (const unit of units) {
    const root = uf.find(unit.id);
    const group = groups.get(root);
    if (group) {
      group.push(unit.id);
    } else {
      groups.set(root, [unit.id]);
    }
  }

  return Array.from(groups.values())
    .filter((ids) => ids.length > 1)
    .map((ids) => [...ids].sort((a, b) => a - b))
    .sort((a, b) => a[0] - b[0])
    .map((participantIds, index) => ({ id: index + 1, participantIds }));
}

export function findEngagementOf(
  engagements: Engagement[],
  unitId: number
): Engagement | undefined {
  return engagements.find((e) => e.participantIds.includes(unitId));
}
