/** A required argument was absent or out of range.  Thrown before any mutation. */
export class InvalidArgumentError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "InvalidArgumentError";
	}
}

/** The addressed key is not present in the tree.  Thrown before any mutation. */
export class NotFoundError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "NotFoundError";
	}
}
