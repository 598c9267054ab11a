// ---------------------------------------------------------------------------
// Host persistence: the host application's side of the write-back
// ---------------------------------------------------------------------------

/**
 * Operations the host application exposes for its domain objects.
 *
 * Implementations reject (throw) on failure; the engine converts that
 * into a {@link LocalCommitError}. `setExternalKeyAndNote` must apply both
 * writes in one host transaction: either both land or neither does.
 */
export interface HostPersistence {
	/** The object's current external key, or `null`/`""` when it has none. */
	getExternalKey(objectId: string): Promise<string | null>;
	/** Store the external key and append the audit note atomically. */
	setExternalKeyAndNote(objectId: string, externalKey: string, note: string): Promise<void>;
	/** Append a note to the object's history. */
	appendNote(objectId: string, text: string): Promise<void>;
}

/** Which host operation an injected failure applies to. */
export type HostOperation = "read" | "commit" | "note";

/**
 * In-memory host persistence for embedding and tests.
 *
 * {@link MemoryHostPersistence.failNext} queues a failure for the next call
 * of one operation. A failed commit writes neither the key nor the note.
 */
export class MemoryHostPersistence implements HostPersistence {
	private readonly keys = new Map<string, string>();
	private readonly notes = new Map<string, string[]>();
	private readonly failures: Record<HostOperation, Error[]> = { read: [], commit: [], note: [] };

	/** Give an object an external key without a note, as if set by a user. */
	seed(objectId: string, externalKey: string): void {
		this.keys.set(objectId, externalKey);
	}

	/** Make the next `operation` call reject with `error`. */
	failNext(operation: HostOperation, error: Error = new Error(`host ${operation} failed`)): void {
		this.failures[operation].push(error);
	}

	externalKeyOf(objectId: string): string | null {
		return this.keys.get(objectId) ?? null;
	}

	notesOf(objectId: string): string[] {
		return [...(this.notes.get(objectId) ?? [])];
	}

	async getExternalKey(objectId: string): Promise<string | null> {
		this.throwIfFailing("read");
		return this.externalKeyOf(objectId);
	}

	async setExternalKeyAndNote(objectId: string, externalKey: string, note: string): Promise<void> {
		this.throwIfFailing("commit");
		this.keys.set(objectId, externalKey);
		this.push(objectId, note);
	}

	async appendNote(objectId: string, text: string): Promise<void> {
		this.throwIfFailing("note");
		this.push(objectId, text);
	}

	private push(objectId: string, text: string): void {
		const list = this.notes.get(objectId) ?? [];
		list.push(text);
		this.notes.set(objectId, list);
	}

	private throwIfFailing(operation: HostOperation): void {
		const error = this.failures[operation].shift();
		if (error) throw error;
	}
}
