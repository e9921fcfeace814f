export async function mapWithConcurrency<T, R>(
	items: readonly T[],
	limit: number,
	mapper: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
	const capped = Math.max(1, limit);
	const results: R[] = new Array(items.length);
	let cursor = 0;
	let failed = false;
	const workers = Array.from(
		{ length: Math.min(capped, items.length) },
		async () => {
			while (!failed) {
				const idx = cursor;
				cursor += 1;
				if (idx >= items.length) {
					break;
				}
				try {
					results[idx] = await mapper(items[idx], idx);
				} catch (error) {
					// Stop handing out items once any mapper rejects.
					failed = true;
					throw error;
				}
			}
		},
	);
	await Promise.all(workers);
	return results;
}

export function chunkArray<T>(items: readonly T[], size: number): T[][] {
	const step = Math.max(1, size);
	const chunks: T[][] = [];
	for (let i = 0; i < items.length; i += step) {
		chunks.push(items.slice(i, i + step));
	}
	return chunks;
}
