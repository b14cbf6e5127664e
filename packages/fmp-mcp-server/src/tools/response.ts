export function wrapResponse(data: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(data, null, 2) }] };
}

/** FMP list endpoints return an array; anything else is treated as empty. */
export function asRows(data: unknown): unknown[] {
  return Array.isArray(data) ? data : [];
}
