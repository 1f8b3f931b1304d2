import type { Individual } from '../species/species.individual';

/** Why a run stopped. */
export type TerminationReason =
  | 'no-generation-block'
  | 'generation-limit'
  | 'cancelled'
  | 'error';

/**
 * Observer of a running system. Every callback is optional and runs
 * synchronously inside the step that triggered it; populations passed to
 * `onYield` are only valid for the duration of the call, so a monitor must copy
 * what it keeps.
 */
export interface Monitor {
  onYield?(name: string, individuals: readonly Individual[], generation: number): void;
  /** Values published by operators through `context.notify`. */
  onNotify?(sender: string, name: string, value: unknown): void;
  /** Called after the generation counter advances. */
  onGeneration?(generation: number): void;
  onTerminate?(reason: TerminationReason, error?: unknown): void;
}

/** Fan-out to several monitors, in order. */
export class MultiMonitor implements Monitor {
  private readonly monitors: Monitor[];

  constructor(...monitors: Monitor[]) {
    this.monitors = monitors;
  }

  add(monitor: Monitor): this {
    this.monitors.push(monitor);
    return this;
  }

  onYield(name: string, individuals: readonly Individual[], generation: number): void {
    for (const monitor of this.monitors) monitor.onYield?.(name, individuals, generation);
  }

  onNotify(sender: string, name: string, value: unknown): void {
    for (const monitor of this.monitors) monitor.onNotify?.(sender, name, value);
  }

  onGeneration(generation: number): void {
    for (const monitor of this.monitors) monitor.onGeneration?.(generation);
  }

  onTerminate(reason: TerminationReason, error?: unknown): void {
    for (const monitor of this.monitors) monitor.onTerminate?.(reason, error);
  }
}

export interface YieldRecord {
  name: string;
  generation: number;
  individuals: Individual[];
}

/** Keeps clones of everything it sees; handy in tests and notebooks. */
export class RecordingMonitor implements Monitor {
  readonly yields: YieldRecord[] = [];
  readonly notifications: Array<{ sender: string; name: string; value: unknown }> = [];
  readonly generations: number[] = [];
  termination: { reason: TerminationReason; error?: unknown } | undefined;

  onYield(name: string, individuals: readonly Individual[], generation: number): void {
    this.yields.push({
      name,
      generation,
      individuals: individuals.map((individual) => individual.clone()),
    });
  }

  onNotify(sender: string, name: string, value: unknown): void {
    this.notifications.push({ sender, name, value });
  }

  onGeneration(generation: number): void {
    this.generations.push(generation);
  }

  onTerminate(reason: TerminationReason, error?: unknown): void {
    this.termination = { reason, error };
  }

  /** Most recent yield of `name`, if any. */
  last(name: string): YieldRecord | undefined {
    for (let i = this.yields.length - 1; i >= 0; i--) {
      if (this.yields[i].name === name) return this.yields[i];
    }
    return undefined;
  }
}
