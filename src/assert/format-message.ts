/**
 * Substitute `{0}`, `{1}`, ... in `message` with the matching argument.
 * Placeholders without an argument are left as written.
 */
export function formatMessage(message: string, args: readonly unknown[]): string {
  if (args.length === 0) return message;
  return message.replace(/\{(\d+)\}/g, (placeholder, index: string) => {
    const i = Number(index);
    return i < args.length ? String(args[i]) : placeholder;
  });
}
