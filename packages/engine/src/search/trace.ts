/**
 * Trace collector for debugging and observability of searches.
 */

import type { Position } from "../core/coords";
import type { SearchAlgorithm } from "./types";

export type SearchTraceEventType =
  | "start"
  | "expand"
  | "relax"
  | "skip-stale"
  | "goal"
  | "exhausted";

export interface SearchTraceEvent {
  /** Milliseconds since the collector was created */
  readonly timestamp: number;
  readonly algorithm: SearchAlgorithm;
  readonly eventType: SearchTraceEventType;
  readonly x?: number;
  readonly y?: number;
  readonly data?: Readonly<Record<string, number>>;
}

export interface SearchTraceSummary {
  readonly expanded: number;
  readonly relaxed: number;
  readonly staleSkips: number;
  readonly peakFrontier: number;
  readonly outcome: "goal" | "exhausted" | "running" | "idle";
  readonly durationMs: number;
}

/**
 * Records what a search does, step by step.
 *
 * Disabled by default so it can be passed around unconditionally;
 * a disabled collector records nothing.
 *
 * @example
 * ```typescript
 * const trace = new SearchTraceCollector(true);
 * astarSearch(unitMove, origin, destination, { trace });
 * trace.summary().expanded;
 * ```
 */
export class SearchTraceCollector {
  readonly enabled: boolean;
  private readonly events: SearchTraceEvent[] = [];
  private readonly startTime: number;
  private expanded = 0;
  private relaxed = 0;
  private staleSkips = 0;
  private peakFrontier = 0;
  private outcome: SearchTraceSummary["outcome"] = "idle";

  constructor(enabled: boolean = false) {
    this.enabled = enabled;
    this.startTime = performance.now();
  }

  private emit(
    algorithm: SearchAlgorithm,
    eventType: SearchTraceEventType,
    position?: Position,
    data?: Record<string, number>,
  ): void {
    this.events.push({
      timestamp: performance.now() - this.startTime,
      algorithm,
      eventType,
      ...(position && { x: position.x, y: position.y }),
      ...(data && { data }),
    });
  }

  start(algorithm: SearchAlgorithm, origin: Position): void {
    if (!this.enabled) return;
    this.outcome = "running";
    this.emit(algorithm, "start", origin);
  }

  expand(
    algorithm: SearchAlgorithm,
    position: Position,
    frontierSize: number,
  ): void {
    if (!this.enabled) return;
    this.expanded++;
    this.peakFrontier = Math.max(this.peakFrontier, frontierSize);
    this.emit(algorithm, "expand", position, { frontierSize });
  }

  relax(algorithm: SearchAlgorithm, position: Position, cost: number): void {
    if (!this.enabled) return;
    this.relaxed++;
    this.emit(algorithm, "relax", position, { cost });
  }

  skipStale(algorithm: SearchAlgorithm, position: Position): void {
    if (!this.enabled) return;
    this.staleSkips++;
    this.emit(algorithm, "skip-stale", position);
  }

  goal(algorithm: SearchAlgorithm, position: Position): void {
    if (!this.enabled) return;
    this.outcome = "goal";
    this.emit(algorithm, "goal", position);
  }

  exhausted(algorithm: SearchAlgorithm): void {
    if (!this.enabled) return;
    this.outcome = "exhausted";
    this.emit(algorithm, "exhausted");
  }

  getEvents(): readonly SearchTraceEvent[] {
    return this.events;
  }

  summary(): SearchTraceSummary {
    const last = this.events[this.events.length - 1];
    return {
      expanded: this.expanded,
      relaxed: this.relaxed,
      staleSkips: this.staleSkips,
      peakFrontier: this.peakFrontier,
      outcome: this.outcome,
      durationMs: last?.timestamp ?? 0,
    };
  }

  clear(): void {
    this.events.length = 0;
    this.expanded = 0;
    this.relaxed = 0;
    this.staleSkips = 0;
    this.peakFrontier = 0;
    this.outcome = "idle";
  }
}
