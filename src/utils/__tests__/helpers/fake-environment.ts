import type { ConfigEnvironment } from '../../environment.js';

/**
 * In-memory ConfigEnvironment that records what the resolver does
 */
export class FakeEnvironment implements ConfigEnvironment {
  readonly created: Array<{ path: string; mode: number }> = [];
  readonly reads: string[] = [];
  readonly failures = new Map<string, Error>();
  private readonly existing: Set<string>;

  constructor(
    readonly platform: NodeJS.Platform,
    private readonly vars: Record<string, string> = {},
    existing: string[] = []
  ) {
    this.existing = new Set(existing);
  }

  setVar(name: string, value: string): void {
    this.vars[name] = value;
  }

  getVar(name: string): string | undefined {
    this.reads.push(name);
    return Object.prototype.hasOwnProperty.call(this.vars, name) ? this.vars[name] : undefined;
  }

  pathExists(path: string): boolean {
    return this.existing.has(path);
  }

  mkdirAll(path: string, mode: number): void {
    const failure = this.failures.get(path);
    if (failure) {
      throw failure;
    }
    this.created.push({ path, mode });
    this.existing.add(path);
  }
}
