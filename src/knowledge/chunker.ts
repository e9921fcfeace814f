import { sha256Hex } from "../utils/hash";

export interface ChunkingPolicy {
	size: number;
	overlap: number;
}

export interface TextChunk {
	sequence: number;
	text: string;
	contentHash: string;
}

// Share of the window, from its end, searched for a natural break.
const BREAK_SEARCH_RATIO = 0.2;

export function normalizeDocumentText(text: string): string {
	return text
		.replace(/\r\n?/g, "\n")
		.replace(/[ \t]+$/gm, "")
		.trim();
}

function findBreak(text: string, start: number, end: number, size: number): number {
	const searchFrom = start + Math.floor(size * (1 - BREAK_SEARCH_RATIO));
	const window = text.slice(searchFrom, end);

	const paragraph = window.lastIndexOf("\n\n");
	if (paragraph >= 0) {
		return searchFrom + paragraph + 2;
	}
	const line = window.lastIndexOf("\n");
	if (line >= 0) {
		return searchFrom + line + 1;
	}
	const space = window.search(/\s(?=\S*$)/);
	if (space >= 0) {
		return searchFrom + space + 1;
	}
	return end;
}

/**
 * Splits a document into overlapping spans in source order. The same input
 * always yields the same boundaries and hashes.
 */
export function chunkText(text: string, policy: ChunkingPolicy): TextChunk[] {
	const normalized = normalizeDocumentText(text);
	const size = Math.max(1, policy.size);
	const overlap = Math.min(Math.max(0, policy.overlap), size - 1);
	const chunks: TextChunk[] = [];

	let start = 0;
	while (start < normalized.length) {
		let end = Math.min(start + size, normalized.length);
		if (end < normalized.length) {
			end = findBreak(normalized, start, end, size);
		}

		const piece = normalized.slice(start, end).trim();
		if (piece.length > 0) {
			chunks.push({
				sequence: chunks.length,
				text: piece,
				contentHash: sha256Hex(piece),
			});
		}

		if (end >= normalized.length) {
			break;
		}
		start = Math.max(end - overlap, start + 1);
	}

	return chunks;
}
