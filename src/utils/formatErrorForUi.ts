/**
 * Convert an unknown thrown value into a user-visible string.
 *
 * Stack traces only help when debugging; the CLI asks for them when DEBUG is set.
 */
export function formatErrorForUi(error: unknown, opts?: { maxChars?: number, stack?: boolean }): string {
    const maxChars = Math.max(1000, opts?.maxChars ?? 50_000);
    const msg = error instanceof Error
        ? ((opts?.stack ? error.stack : undefined) || error.message || String(error))
        : String(error);

    return msg.length > maxChars ? `${msg.slice(0, maxChars)}\n…[truncated]` : msg;
}
