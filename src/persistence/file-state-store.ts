/**
 * FileStateStore — one JSON file per engine.
 *
 * Saves write a temp file beside the target and rename it into place, so a
 * reader sees either the old snapshot or the new one. Saves are serialized.
 */

import { readFile, rename, writeFile } from "node:fs/promises";
import { validate } from "../lib/validation/index.js";
import { SystemError, type TradingError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { type EngineSnapshot, engineSnapshotSchema } from "./engine-snapshot.js";
import type { StateStore } from "./state-store.js";

export interface FileStateStoreConfig {
	readonly filePath: string;
}

export class FileStateStore implements StateStore {
	private readonly filePath: string;
	private writeQueue: Promise<void> = Promise.resolve();

	private constructor(config: FileStateStoreConfig) {
		this.filePath = config.filePath;
	}

	static create(config: FileStateStoreConfig): FileStateStore {
		return new FileStateStore(config);
	}

	/** @throws Error naming the file when the write or rename fails */
	async save(snapshot: EngineSnapshot): Promise<void> {
		const content = `${JSON.stringify(snapshot, null, "\t")}\n`;
		const write = () => this.writeOnce(content);
		// a failed earlier save has already rejected for its own caller
		this.writeQueue = this.writeQueue.then(write, write);
		await this.writeQueue;
	}

	async load(): Promise<Result<EngineSnapshot | null, TradingError>> {
		let content: string;
		try {
			content = await readFile(this.filePath, "utf-8");
		} catch (e: unknown) {
			if (isNodeError(e) && e.code === "ENOENT") return ok(null);
			return err(new SystemError(`Cannot read ${this.filePath}`, { cause: e }));
		}

		let raw: unknown;
		try {
			raw = JSON.parse(content);
		} catch (e) {
			return err(new SystemError(`Corrupt snapshot file ${this.filePath}`, { cause: e }));
		}
		return validate(engineSnapshotSchema, raw);
	}

	private async writeOnce(content: string): Promise<void> {
		const tmp = `${this.filePath}.${process.pid}.tmp`;
		try {
			await writeFile(tmp, content, "utf-8");
			await rename(tmp, this.filePath);
		} catch (e: unknown) {
			const code = isNodeError(e) ? e.code : "UNKNOWN";
			const msg = e instanceof Error ? e.message : String(e);
			throw new Error(`FileStateStore write to ${this.filePath} failed: [${code}] ${msg}`, { cause: e });
		}
	}
}

function isNodeError(e: unknown): e is NodeJS.ErrnoException {
	return e instanceof Error && "code" in e;
}
