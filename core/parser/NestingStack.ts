import type { MathDelimiter, SourceLocation } from '@core/types';

export type ScopeMarker =
  | { kind: 'Group'; opener: SourceLocation }
  | { kind: 'Environment'; name: string; opener: SourceLocation }
  | { kind: 'Math'; delimiter: MathDelimiter; opener: SourceLocation }
  | { kind: 'Optional'; opener: SourceLocation };

export type ScopeKind = ScopeMarker['kind'];

/**
 * Open scopes of one parse, innermost last.
 *
 * Closers are matched against the nearest compatible marker; markers above
 * the match are the scopes left unterminated by that closer.
 */
export class NestingStack {
  private readonly markers: ScopeMarker[] = [];

  /**
   * Push a marker and return its level (index in the stack)
   */
  push(marker: ScopeMarker): number {
    this.markers.push(marker);
    return this.markers.length - 1;
  }

  pop(): ScopeMarker | undefined {
    return this.markers.pop();
  }

  get depth(): number {
    return this.markers.length;
  }

  get isEmpty(): boolean {
    return this.markers.length === 0;
  }

  top(): ScopeMarker | undefined {
    return this.markers[this.markers.length - 1];
  }

  topLevel(): number {
    return this.markers.length - 1;
  }

  /**
   * Level of the innermost marker of the given kind, or -1.
   * Searching stops with -1 at the first marker whose kind is in `barriers`.
   */
  nearest(kind: ScopeKind, barriers: readonly ScopeKind[] = []): number {
    for (let level = this.markers.length - 1; level >= 0; level--) {
      const marker = this.markers[level];
      if (marker.kind === kind) {
        return level;
      }
      if (barriers.includes(marker.kind)) {
        return -1;
      }
    }
    return -1;
  }

  /** Snapshot of the open scopes, outermost first */
  snapshot(): readonly ScopeMarker[] {
    return [...this.markers];
  }
}
