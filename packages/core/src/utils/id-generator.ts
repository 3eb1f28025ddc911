/**
 * Counter for sequential IDs within a process
 * Reset on process restart
 */
let sequentialCounter = 0;

/**
 * Generate a timestamp-based key for rows inserted without a primary key.
 * Format: timestamp-random-counter, all base 36
 * Example: "lq2x1c9s-a3f2-0001"
 */
export function generateId(): string {
	const timestamp = Date.now().toString(36);
	const random = Math.random().toString(36).substring(2, 6).padEnd(4, "0");
	const counter = (++sequentialCounter).toString(36).padStart(4, "0");
	return `${timestamp}-${random}-${counter}`;
}
