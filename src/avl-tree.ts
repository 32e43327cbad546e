import { InvalidArgumentError, NotFoundError } from "./errors";
import { AvlNode, IAvlNode, heightOf } from "./nodes";

/**
 * Represents a height-balanced (AVL) binary search tree.
 * Every node's subtree heights differ by at most one, so lookup, insert and remove are O(log n).
 * Duplicate keys are not stored.
 * @template TKey The type of keys used for ordering the entries.  This might be an element of TEntry, or TEntry itself.
 * @template TEntry The type of entries stored in the tree.  Each entry carries its key (see keyFromEntry); lookups return the stored entry.
 */
export class AvlTree<TKey, TEntry> {
	private _root: AvlNode<TEntry> | undefined;
	private _size = 0;

	/**
	 * @param [keyFromEntry=(entry: TEntry) => entry as unknown as TKey] a function to extract the key from an entry.  The default assumes the key is the entry itself.
	 * @param [compare=(a: TKey, b: TKey) => a < b ? -1 : a > b ? 1 : 0] a comparison function for keys.  The default uses < and > operators.
	 */
	constructor(
		private readonly keyFromEntry = (entry: TEntry) => entry as unknown as TKey,
		private readonly compare: (a: TKey, b: TKey) => number = (a, b) => a < b ? -1 : a > b ? 1 : 0,
	) { }

	/**
	 * Builds a tree by inserting the given entries in sequence order.  Duplicates are skipped.
	 * The sequence is rejected wholesale if it, or any entry in it, is absent.
	 */
	static from<TKey, TEntry>(
		entries: Iterable<TEntry>,
		keyFromEntry?: (entry: TEntry) => TKey,
		compare?: (a: TKey, b: TKey) => number,
	): AvlTree<TKey, TEntry> {
		if (entries === undefined || entries === null) {
			throw new InvalidArgumentError("Entries must be provided");
		}
		const list = [...entries];
		if (list.some(entry => entry === undefined || entry === null)) {
			throw new InvalidArgumentError("Entries must not contain null or undefined");
		}
		const tree = new AvlTree<TKey, TEntry>(keyFromEntry, compare);
		for (const entry of list) {
			tree.insert(entry);
		}
		return tree;
	}

	/** Root node, for inspection only.  undefined if the tree is empty. */
	get root(): IAvlNode<TEntry> | undefined {
		return this._root;
	}

	/** @returns the number of entries stored. */
	size(): number {
		return this._size;
	}

	/** @returns the height of the root; -1 for an empty tree, 0 for a single entry.  O(1). */
	height(): number {
		return heightOf(this._root);
	}

	/** @returns true if an entry with the given key is stored. */
	contains(key: TKey): boolean {
		this.requireKey(key);
		return this.findNode(key) !== undefined;
	}

	/**
	 * Retrieves the stored entry for the given key.  This is the entry object that was inserted, not the query key.
	 * @throws NotFoundError if the key is not present.
	 */
	get(key: TKey): TEntry {
		this.requireKey(key);
		const node = this.findNode(key);
		if (!node) {
			throw new NotFoundError("Key is not present in the tree");
		}
		return node.entry;
	}

	/**
	 * Adds an entry to the tree.  Be sure to check the result, as the tree does not allow duplicate keys.
	 * @returns true if the entry was added; false if an entry with the same key was already present (tree unchanged).
	 */
	insert(entry: TEntry): boolean {
		if (entry === undefined || entry === null) {
			throw new InvalidArgumentError("Cannot insert a null or undefined entry");
		}
		const [root, inserted] = this.insertInto(this._root, entry, this.keyFromEntry(entry));
		this._root = root;
		if (inserted) {
			++this._size;
		}
		return inserted;
	}

	/**
	 * Removes the entry with the given key.
	 * @returns the entry that was stored under the key.
	 * @throws NotFoundError if the key is not present; the tree is left unchanged.
	 */
	remove(key: TKey): TEntry {
		const removed = this.get(key);
		this._root = this.removeFrom(this._root, key);
		--this._size;
		return removed;
	}

	/** Releases all nodes. */
	clear() {
		this._root = undefined;
		this._size = 0;
	}

	/** @returns an independent tree with the same shape and entries.  No nodes are shared with this tree. */
	clone(): AvlTree<TKey, TEntry> {
		const copy = new AvlTree<TKey, TEntry>(this.keyFromEntry, this.compare);
		copy._root = this.cloneNode(this._root);
		copy._size = this._size;
		return copy;
	}

	/**
	 * Finds every entry within the given tree-edge distance of the entry with the given key (the entry itself included).
	 * "Distance" is the number of parent-child links between two nodes.
	 * @param maxDistance non-negative integer; 0 yields only the target entry.
	 * @throws InvalidArgumentError if maxDistance is negative or not an integer.
	 * @throws NotFoundError if the key is not present.
	 */
	neighborhood(key: TKey, maxDistance: number): Set<TEntry> {
		this.requireKey(key);
		if (!Number.isInteger(maxDistance) || maxDistance < 0) {
			throw new InvalidArgumentError(`Distance must be a non-negative integer; got ${maxDistance}`);
		}
		if (!this.findNode(key)) {
			throw new NotFoundError("Key is not present in the tree");
		}
		const result = new Set<TEntry>();
		this.collectAlongPath(this._root, key, maxDistance, result);
		return result;
	}

	/**
	 * Compares two keys with the injected comparator, rejecting a comparator that orders a pair the same way in both directions.
	 * Every descent and rotation decision goes through here; a subclass may override it to skip the check.
	 */
	protected compareKeys(a: TKey, b: TKey): number {
		const result = this.compare(a, b);
		if (result !== 0 && result === this.compare(b, a)) {
			throw new Error("Inconsistent comparison function for given values");
		}
		return result;
	}

	private requireKey(key: TKey) {
		if (key === undefined || key === null) {
			throw new InvalidArgumentError("Key cannot be null or undefined");
		}
	}

	private findNode(key: TKey): AvlNode<TEntry> | undefined {
		let node = this._root;
		while (node) {
			const result = this.compareKeys(key, this.keyFromEntry(node.entry));
			if (result === 0) {
				return node;
			}
			node = result < 0 ? node.left : node.right;
		}
		return undefined;
	}

	/** @returns the (possibly rotated) subtree to reattach in place of the given one, and whether the entry was added. */
	private insertInto(node: AvlNode<TEntry> | undefined, entry: TEntry, key: TKey): [node: AvlNode<TEntry>, inserted: boolean] {
		if (!node) {
			return [new AvlNode(entry), true];
		}
		const result = this.compareKeys(key, this.keyFromEntry(node.entry));
		if (result === 0) {
			return [node, false];	// Duplicate - nothing below changed
		}
		let inserted: boolean;
		if (result < 0) {
			[node.left, inserted] = this.insertInto(node.left, entry, key);
		} else {
			[node.right, inserted] = this.insertInto(node.right, entry, key);
		}
		return [inserted ? this.rebalance(node) : node, inserted];
	}

	/** Assumes the key is present (checked by caller). @returns the subtree to reattach in place of the given one. */
	private removeFrom(node: AvlNode<TEntry> | undefined, key: TKey): AvlNode<TEntry> | undefined {
		if (!node) {
			throw new Error("Key to remove vanished during descent");
		}
		const result = this.compareKeys(key, this.keyFromEntry(node.entry));
		if (result < 0) {
			node.left = this.removeFrom(node.left, key);
		} else if (result > 0) {
			node.right = this.removeFrom(node.right, key);
		} else if (!node.left) {
			return node.right;
		} else if (!node.right) {
			return node.left;
		} else {
			// Two children: keep this node, take over the successor's entry, then remove the successor below
			const successor = this.leftmost(node.right);
			node.entry = successor.entry;
			node.right = this.removeFrom(node.right, this.keyFromEntry(successor.entry));
		}
		return this.rebalance(node);
	}

	private leftmost(node: AvlNode<TEntry>): AvlNode<TEntry> {
		while (node.left) {
			node = node.left;
		}
		return node;
	}

	private updateMetrics(node: AvlNode<TEntry>) {
		const leftHeight = heightOf(node.left);
		const rightHeight = heightOf(node.right);
		node.height = 1 + Math.max(leftHeight, rightHeight);
		node.balanceFactor = leftHeight - rightHeight;
	}

	/** Recomputes the node's metrics and rotates if it is out of balance.  Ancestors are the caller's concern. */
	private rebalance(node: AvlNode<TEntry>): AvlNode<TEntry> {
		this.updateMetrics(node);
		if (node.balanceFactor < -1) {
			const right = this.pivot(node.right);
			if (right.balanceFactor > 0) {	// right-left
				node.right = this.rotateRight(right);
			}
			return this.rotateLeft(node);
		}
		if (node.balanceFactor > 1) {
			const left = this.pivot(node.left);
			if (left.balanceFactor < 0) {	// left-right
				node.left = this.rotateLeft(left);
			}
			return this.rotateRight(node);
		}
		return node;
	}

	private rotateRight(node: AvlNode<TEntry>): AvlNode<TEntry> {
		const pivot = this.pivot(node.left);
		node.left = pivot.right;
		pivot.right = node;
		this.updateMetrics(node);	// Lower node first; the pivot's metrics depend on it
		this.updateMetrics(pivot);
		return pivot;
	}

	private rotateLeft(node: AvlNode<TEntry>): AvlNode<TEntry> {
		const pivot = this.pivot(node.right);
		node.right = pivot.left;
		pivot.left = node;
		this.updateMetrics(node);
		this.updateMetrics(pivot);
		return pivot;
	}

	private pivot(child: AvlNode<TEntry> | undefined): AvlNode<TEntry> {
		if (!child) {
			throw new Error("Rotation requires a child on the heavy side");
		}
		return child;
	}

	/**
	 * Descends toward the target, adding path nodes within range on the way back up and fanning out into off-path subtrees.
	 * @returns this node's distance from the target.
	 */
	private collectAlongPath(node: AvlNode<TEntry> | undefined, key: TKey, maxDistance: number, result: Set<TEntry>): number {
		if (!node) {
			throw new Error("Neighborhood target vanished during descent");
		}
		const comparison = this.compareKeys(key, this.keyFromEntry(node.entry));
		let childDistance = -1;	// The target itself ends up at 0
		let offPath: (AvlNode<TEntry> | undefined)[];
		if (comparison < 0) {
			childDistance = this.collectAlongPath(node.left, key, maxDistance, result);
			offPath = [node.right];
		} else if (comparison > 0) {
			childDistance = this.collectAlongPath(node.right, key, maxDistance, result);
			offPath = [node.left];
		} else {
			offPath = [node.left, node.right];
		}

		const distance = childDistance + 1;
		if (distance <= maxDistance) {
			result.add(node.entry);
		}
		if (distance < maxDistance) {
			for (const child of offPath) {
				if (child) {
					this.collectBelow(child, distance + 1, maxDistance, result);
				}
			}
		}
		return distance;
	}

	/** Adds the given node (at the given distance) and its descendants that remain within maxDistance. */
	private collectBelow(node: AvlNode<TEntry>, distance: number, maxDistance: number, result: Set<TEntry>) {
		result.add(node.entry);
		if (distance < maxDistance) {
			if (node.left) {
				this.collectBelow(node.left, distance + 1, maxDistance, result);
			}
			if (node.right) {
				this.collectBelow(node.right, distance + 1, maxDistance, result);
			}
		}
	}

	private cloneNode(node: AvlNode<TEntry> | undefined): AvlNode<TEntry> | undefined {
		if (!node) {
			return undefined;
		}
		const copy = new AvlNode(node.entry, this.cloneNode(node.left), this.cloneNode(node.right));
		copy.height = node.height;
		copy.balanceFactor = node.balanceFactor;
		return copy;
	}
}
