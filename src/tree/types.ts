/**
 * Function-shaped parameters shared by the tree operations.
 *
 * `F` is the caller's record type and is never inspected directly.
 * `T` is the id type; ids are compared the way `Map` keys are (SameValueZero).
 */

export type IdAccessor<F, T> = (record: F) => T;

export type ParentIdAccessor<F, T> = (record: F) => T;

export type RootPredicate<F> = (record: F) => boolean;

/**
 * Reads a node's children. `null` and `undefined` count as no children.
 */
export type ChildrenAccessor<F> = (record: F) => readonly F[] | null | undefined;

/**
 * Stores a child list onto a record. Only called during assembly,
 * exactly once per visited node.
 */
export type AttachChildren<F> = (record: F, children: F[]) => void;

export type IncludeFilter<F> = (record: F) => boolean;

/**
 * Post-order listener; depth starts at 0 for roots.
 */
export type VisitListener<F> = (depth: number, record: F) => void;

/**
 * Pre/post callbacks for {@link walkTree}.
 */
export type WalkCallback<F> = (record: F, depth: number) => void;

/**
 * Accessors for converting a flat collection into a tree
 */
export interface TreeAccessors<F, T> {
  getId: IdAccessor<F, T>;
  getParentId: ParentIdAccessor<F, T>;
  isRoot: RootPredicate<F>;
  setChildren: AttachChildren<F>;
}

/**
 * Opt-in guards for assembly. Both are off unless configured.
 */
export interface AssembleOptions {
  /** Deepest depth a node may be visited at; 0 disables the guard */
  maxDepth?: number;
  /** Fail when a node's id already appears on its ancestor path */
  detectCycles?: boolean;
}

export interface ConvertOptions<F> extends AssembleOptions {
  onVisit?: VisitListener<F>;
  /** Validate duplicate ids and parent-id cycles before assembling */
  strict?: boolean;
}

export interface ConcurrentConvertOptions<F> extends ConvertOptions<F> {
  partitionSize?: number;
}

/**
 * Nullable sequence accepted by every entry point; absent means empty.
 */
export type Sequence<F> = readonly F[] | null | undefined;
