/**
 * @fileoverview WaitGraph - Deadlock Detection for Shared Async Constructions
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A resolution path catches a cycle inside one resolution chain. Two
 * chains that each join the other's in-flight async construction never
 * share a path:
 *
 * ```
 * resolveAsync(A) ── A's factory ── awaits B (pending) ──┐
 * resolveAsync(B) ── B's factory ── awaits A (pending) ──┘  never settles
 * ```
 *
 * The graph records which capabilities wait on which pending
 * construction, and refuses a join that would close a loop.
 *
 * @version 1.0.0
 */

import { type Capability, CyclicDependencyError, getCapabilityName } from '../../domain/di';

/**
 * Waits-for edges between capabilities under construction.
 *
 * @internal
 */
export class WaitGraph {
  private readonly edges = new Map<Capability, Set<Capability>>();

  /**
   * Record that every capability on `path` now waits for the pending
   * construction of `target`.
   *
   * @throws CyclicDependencyError when `target` already waits, directly
   * or through other pending constructions, on a capability of `path`
   */
  join(path: readonly Capability[], target: Capability): void {
    if (path.length === 0) {
      return;
    }

    if (this.reaches(target, new Set(path))) {
      throw new CyclicDependencyError(
        target,
        path.map((capability) => getCapabilityName(capability)),
      );
    }

    for (const waiter of path) {
      let targets = this.edges.get(waiter);
      if (!targets) {
        targets = new Set();
        this.edges.set(waiter, targets);
      }
      targets.add(target);
    }
  }

  /**
   * Drop every edge into and out of a construction that has settled.
   */
  settle(target: Capability): void {
    this.edges.delete(target);
    for (const [waiter, targets] of this.edges) {
      targets.delete(target);
      if (targets.size === 0) {
        this.edges.delete(waiter);
      }
    }
  }

  private reaches(from: Capability, goals: ReadonlySet<Capability>): boolean {
    const seen = new Set<Capability>();
    const stack = [from];

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || seen.has(current)) {
        continue;
      }
      if (goals.has(current)) {
        return true;
      }
      seen.add(current);
      stack.push(...(this.edges.get(current) ?? []));
    }

    return false;
  }
}
