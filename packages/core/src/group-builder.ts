/**
 * @module group-builder
 * TestGroupBuilder — partitions discovered test units into ordered groups
 * by kind, tag or custom predicate.
 *
 * Each selection call appends exactly one group (or, for `addBalanced`,
 * one group per slot). Groups are independent views: a unit may appear in
 * several of them, and a selection that matches nothing yields an empty
 * group rather than an error.
 */

import type { TestGroup, TestKind, TestUnit } from './types.js';
import { HarnessError } from './errors.js';

export interface TestUnitInput {
  id: string;
  kind?: TestKind;
  tags?: Iterable<string>;
}

/** Strip a leading `@` so `@smoke` and `smoke` select the same units. */
export function normalizeTag(tag: string): string {
  return tag.startsWith('@') ? tag.slice(1) : tag;
}

/** Create an immutable TestUnit. */
export function createTestUnit(input: TestUnitInput): TestUnit {
  const tags = new Set<string>();
  for (const tag of input.tags ?? []) {
    tags.add(normalizeTag(tag));
  }
  return Object.freeze({
    id: input.id,
    kind: input.kind ?? 'other',
    tags,
  });
}

export interface GroupOptions {
  /** Group identifier; defaults to a name derived from the selection */
  id?: string;
  /** Execution strategy tag; defaults to the kind or tag selected */
  strategy?: string;
}

export type TagMatch = 'any' | 'all';

/**
 * Fluent builder for ordered test groups.
 *
 * ```ts
 * const groups = new TestGroupBuilder(units)
 *   .addKind('api')
 *   .addKind('ui')
 *   .build(); // [kind:api, kind:ui]
 * ```
 */
export class TestGroupBuilder {
  private readonly units: readonly TestUnit[];
  private readonly groups: TestGroup[] = [];
  private readonly usedIds = new Map<string, number>();

  /**
   * @throws {HarnessError} DUPLICATE_TEST_ID when two units share an id
   */
  constructor(units: readonly TestUnit[]) {
    const seen = new Set<string>();
    for (const unit of units) {
      if (seen.has(unit.id)) {
        throw new HarnessError('DUPLICATE_TEST_ID', `Duplicate test unit id: "${unit.id}"`, { testId: unit.id });
      }
      seen.add(unit.id);
    }
    this.units = [...units];
  }

  addKind(kind: TestKind, options?: GroupOptions): this {
    return this.append(
      options?.id ?? `kind:${kind}`,
      options?.strategy ?? kind,
      (unit) => unit.kind === kind,
    );
  }

  addTag(tag: string, options?: GroupOptions): this {
    const wanted = normalizeTag(tag);
    return this.append(
      options?.id ?? `tag:${wanted}`,
      options?.strategy ?? wanted,
      (unit) => unit.tags.has(wanted),
    );
  }

  /** Select units carrying any (default) or all of `tags`. */
  addTags(tags: readonly string[], options?: GroupOptions & { match?: TagMatch }): this {
    const wanted = tags.map(normalizeTag);
    const match = options?.match ?? 'any';
    const predicate = match === 'all'
      ? (unit: TestUnit) => wanted.every((t) => unit.tags.has(t))
      : (unit: TestUnit) => wanted.some((t) => unit.tags.has(t));
    return this.append(
      options?.id ?? `tags:${wanted.join(match === 'all' ? '+' : '|')}`,
      options?.strategy ?? 'mixed',
      predicate,
    );
  }

  addSmoke(): this {
    return this.addTag('smoke', { strategy: 'smoke' });
  }

  addRegression(): this {
    return this.addTag('regression', { strategy: 'regression' });
  }

  addCustom(id: string, predicate: (unit: TestUnit) => boolean, strategy = 'mixed'): this {
    return this.append(id, strategy, predicate);
  }

  /**
   * Distribute every unit round-robin over `count` groups, appending one
   * group per slot (`balanced:1` … `balanced:<count>`).
   */
  addBalanced(count: number, options?: { strategy?: string }): this {
    const slots = Math.max(1, Math.floor(count));
    const buckets: TestUnit[][] = Array.from({ length: slots }, () => []);
    this.units.forEach((unit, index) => {
      buckets[index % slots]?.push(unit);
    });
    buckets.forEach((bucket, index) => {
      this.push(`balanced:${index + 1}`, options?.strategy ?? 'balanced', bucket);
    });
    return this;
  }

  /** Groups built so far, in call order. The builder stays usable. */
  build(): TestGroup[] {
    return [...this.groups];
  }

  private append(id: string, strategy: string, predicate: (unit: TestUnit) => boolean): this {
    this.push(id, strategy, this.units.filter(predicate));
    return this;
  }

  private push(id: string, strategy: string, units: TestUnit[]): void {
    this.groups.push(Object.freeze({
      id: this.uniqueId(id),
      strategy,
      units: Object.freeze(units),
    }));
  }

  private uniqueId(id: string): string {
    const count = (this.usedIds.get(id) ?? 0) + 1;
    this.usedIds.set(id, count);
    return count === 1 ? id : `${id}#${count}`;
  }
}

/** Smoke, API, UI and regression groups, in that order. */
export function createDefaultGroups(units: readonly TestUnit[]): TestGroup[] {
  return new TestGroupBuilder(units)
    .addSmoke()
    .addKind('api')
    .addKind('ui')
    .addRegression()
    .build();
}
