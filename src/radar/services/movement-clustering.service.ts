import { Injectable } from '@nestjs/common';
import {
  ClusterOptions,
  MovementCluster,
  NormalizedItem,
  ThemeDefinition,
} from '../types/radar.types';
import { daysBetween } from '../utils/date.util';
import { shortHash } from '../utils/hash.util';
import { containsKeyword } from '../utils/text.util';

// Distance for pairs that may never link directly (outside the day window).
const BLOCKED = Number.POSITIVE_INFINITY;

function compareItems(a: NormalizedItem, b: NormalizedItem): number {
  if (a.dateMs !== b.dateMs) {
    return a.dateMs - b.dateMs;
  }
  return a.eventUid < b.eventUid ? -1 : a.eventUid > b.eventUid ? 1 : 0;
}

class DisjointSet {
  private readonly parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(i: number): number {
    let root = i;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }
    let node = i;
    while (this.parent[node] !== root) {
      const next = this.parent[node];
      this.parent[node] = root;
      node = next;
    }
    return root;
  }

  // The smaller index always becomes the root.
  union(a: number, b: number): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) {
      return;
    }
    if (rootA < rootB) {
      this.parent[rootB] = rootA;
    } else {
      this.parent[rootA] = rootB;
    }
  }
}

@Injectable()
export class MovementClusteringService {
  /**
   * Combined distance of two items: the textual distance blended with their
   * temporal gap. Pairs further apart than the day window are blocked.
   */
  combinedDistance(
    a: NormalizedItem,
    b: NormalizedItem,
    options: ClusterOptions,
  ): number {
    const days = daysBetween(a.dateMs, b.dateMs);
    if (days > options.dayWindow) {
      return BLOCKED;
    }
    const textual = Math.max(0, Math.min(1, options.metric.distance(a, b)));
    const temporal = days / options.dayWindow;
    return (
      (1 - options.temporalWeight) * textual + options.temporalWeight * temporal
    );
  }

  cluster(
    items: readonly NormalizedItem[],
    options: ClusterOptions,
    themes: readonly ThemeDefinition[],
    fallbackTheme: string,
  ): MovementCluster[] {
    const ordered = [...items].sort(compareItems);
    const groups =
      options.linkage === 'single'
        ? this.singleLinkage(ordered, options)
        : this.agglomerate(ordered, options);

    return groups
      .map((group) =>
        this.toMovement(
          group.map((index) => ordered[index]),
          themes,
          fallbackTheme,
        ),
      )
      .sort(
        (a, b) =>
          Date.parse(a.firstSeen) - Date.parse(b.firstSeen) ||
          (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
      );
  }

  assignThemes(
    titles: readonly string[],
    themes: readonly ThemeDefinition[],
    fallbackTheme: string,
  ): string[] {
    const text = titles.join(' ');
    const matched = themes
      .filter((theme) =>
        theme.keywords.some((keyword) => containsKeyword(text, keyword)),
      )
      .map((theme) => theme.name);
    return matched.length > 0 ? matched : [fallbackTheme];
  }

  movementId(memberIds: readonly string[]): string {
    return `mv-${shortHash(JSON.stringify([...memberIds].sort()))}`;
  }

  // Transitive closure over linked pairs: chains may grow past the threshold.
  private singleLinkage(
    items: readonly NormalizedItem[],
    options: ClusterOptions,
  ): number[][] {
    const sets = new DisjointSet(items.length);
    for (let i = 0; i < items.length; i += 1) {
      for (let j = i + 1; j < items.length; j += 1) {
        // items are date-ordered, so later j are only further away
        if (daysBetween(items[i].dateMs, items[j].dateMs) > options.dayWindow) {
          break;
        }
        if (sets.find(i) === sets.find(j)) {
          continue;
        }
        if (
          this.combinedDistance(items[i], items[j], options) <=
          options.distanceThreshold
        ) {
          sets.union(i, j);
        }
      }
    }

    const groups = new Map<number, number[]>();
    items.forEach((_, index) => {
      const root = sets.find(index);
      const group = groups.get(root) ?? [];
      group.push(index);
      groups.set(root, group);
    });
    return [...groups.values()];
  }

  // Average/complete linkage. A blocked pair makes two groups unmergeable.
  private agglomerate(
    items: readonly NormalizedItem[],
    options: ClusterOptions,
  ): number[][] {
    const n = items.length;
    const pair: number[][] = Array.from({ length: n }, () =>
      new Array<number>(n).fill(0),
    );
    for (let i = 0; i < n; i += 1) {
      for (let j = i + 1; j < n; j += 1) {
        const d = this.combinedDistance(items[i], items[j], options);
        pair[i][j] = d;
        pair[j][i] = d;
      }
    }

    const groups: number[][] = items.map((_, index) => [index]);
    for (;;) {
      let best = BLOCKED;
      let bestA = -1;
      let bestB = -1;
      for (let a = 0; a < groups.length; a += 1) {
        for (let b = a + 1; b < groups.length; b += 1) {
          const d = this.groupDistance(groups[a], groups[b], pair, options);
          if (d < best) {
            best = d;
            bestA = a;
            bestB = b;
          }
        }
      }
      if (bestA < 0 || best > options.distanceThreshold) {
        break;
      }
      groups[bestA] = [...groups[bestA], ...groups[bestB]].sort(
        (x, y) => x - y,
      );
      groups.splice(bestB, 1);
    }
    return groups;
  }

  private groupDistance(
    a: readonly number[],
    b: readonly number[],
    pair: readonly number[][],
    options: ClusterOptions,
  ): number {
    let total = 0;
    let worst = 0;
    for (const i of a) {
      for (const j of b) {
        const d = pair[i][j];
        if (d === BLOCKED) {
          return BLOCKED;
        }
        total += d;
        worst = Math.max(worst, d);
      }
    }
    return options.linkage === 'complete' ? worst : total / (a.length * b.length);
  }

  private toMovement(
    members: NormalizedItem[],
    themes: readonly ThemeDefinition[],
    fallbackTheme: string,
  ): MovementCluster {
    const sorted = [...members].sort(compareItems);
    const representative = [...sorted].sort(
      (a, b) =>
        a.dateMs - b.dateMs ||
        a.title.length - b.title.length ||
        (a.eventUid < b.eventUid ? -1 : a.eventUid > b.eventUid ? 1 : 0),
    )[0];
    const memberIds = sorted.map((item) => item.eventUid);

    return {
      id: this.movementId(memberIds),
      title: representative.title,
      memberIds,
      items: sorted.map((item) => ({
        eventUid: item.eventUid,
        date: item.date,
        title: item.title,
        url: item.url,
        sourceTag: item.sourceTag,
      })),
      firstSeen: sorted[0].date,
      lastSeen: sorted[sorted.length - 1].date,
      themes: this.assignThemes(
        sorted.map((item) => item.title),
        themes,
        fallbackTheme,
      ),
      sources: [...new Set(sorted.map((item) => item.sourceTag))].sort(),
    };
  }
}
