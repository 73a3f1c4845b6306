/**
 * Where a piece of source text came from: a file on disk, or a named in-memory script.
 */
export type SourceOrigin =
  | { kind: 'file'; path: string; text: string }
  | { kind: 'virtual'; name: string; text: string };

export function originName(origin: SourceOrigin): string {
  return origin.kind === 'file' ? origin.path : origin.name;
}

/** 1-based slot in a {@link ContextStore}. */
export type ContextId = number;

/**
 * Per-file parser bookkeeping.
 */
export class Context {
  readonly id: ContextId;
  readonly origin: SourceOrigin;
  private localIds = 0;

  constructor(id: ContextId, origin: SourceOrigin) {
    this.id = id;
    this.origin = origin;
  }

  get name(): string {
    return originName(this.origin);
  }

  nextLocalId(): number {
    this.localIds += 1;
    return this.localIds;
  }
}

/**
 * Arena of contexts indexed by id. Removed slots are tombstoned and never reused.
 */
export class ContextStore {
  private readonly slots: Array<Context | undefined> = [];

  nextContextId(): ContextId {
    return this.slots.length + 1;
  }

  add(origin: SourceOrigin): Context {
    const context = new Context(this.nextContextId(), origin);
    this.slots.push(context);
    return context;
  }

  get(id: ContextId): Context | undefined {
    return this.slots[id - 1];
  }

  /** Returns false when `id` was never allocated or is already removed. */
  remove(id: ContextId): boolean {
    if (this.get(id) === undefined) return false;
    this.slots[id - 1] = undefined;
    return true;
  }

  /** Number of live contexts. */
  get size(): number {
    return this.slots.filter((c) => c !== undefined).length;
  }
}
