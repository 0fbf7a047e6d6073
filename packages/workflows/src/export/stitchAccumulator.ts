import type { StitchKey } from '@loggather/core';

export interface ContainerStream {
  key: StitchKey;
  content: string;
}

export interface EventStream {
  namespace: string;
  content: string;
}

/**
 * Per-run stitched log buffers.
 *
 * Buffers are created on first use, only ever appended to, and live until
 * the run is assembled. Streams come back in first-seen order.
 */
export class StitchAccumulator {
  private readonly containers = new Map<string, { key: StitchKey; lines: string[] }>();
  private readonly events = new Map<string, string[]>();

  appendContainerLine(key: StitchKey, line: string): void {
    const id = JSON.stringify([key.namespace, key.pod, key.container]);
    const buffer = this.containers.get(id);
    if (buffer) {
      buffer.lines.push(line);
    } else {
      this.containers.set(id, { key: { ...key }, lines: [line] });
    }
  }

  appendEventLine(namespace: string, line: string): void {
    const buffer = this.events.get(namespace);
    if (buffer) {
      buffer.push(line);
    } else {
      this.events.set(namespace, [line]);
    }
  }

  containerStreams(): ContainerStream[] {
    return [...this.containers.values()].map(({ key, lines }) => ({ key, content: lines.join('') }));
  }

  eventStreams(): EventStream[] {
    return [...this.events.entries()].map(([namespace, lines]) => ({
      namespace,
      content: lines.join(''),
    }));
  }

  get containerStreamCount(): number {
    return this.containers.size;
  }

  get eventStreamCount(): number {
    return this.events.size;
  }
}
