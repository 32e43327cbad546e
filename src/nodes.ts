/** Read-only view of a tree node.  Exposed for inspection; mutating through it would corrupt the tree. */
export interface IAvlNode<TEntry> {
	readonly entry: TEntry;
	readonly left: IAvlNode<TEntry> | undefined;
	readonly right: IAvlNode<TEntry> | undefined;
	readonly height: number;
	readonly balanceFactor: number;
}

export class AvlNode<TEntry> implements IAvlNode<TEntry> {
	height = 0;
	balanceFactor = 0;	// height(left) - height(right)

	constructor(
		public entry: TEntry,
		public left: AvlNode<TEntry> | undefined = undefined,
		public right: AvlNode<TEntry> | undefined = undefined,
	) { }
}

/** @returns the cached height of the given subtree; -1 when empty */
export function heightOf(node: IAvlNode<unknown> | undefined): number {
	return node ? node.height : -1;
}
