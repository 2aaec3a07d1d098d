export function isHttpUrl(input: string): boolean {
  try {
    const u = new URL(input);
    return u.protocol === 'http:' || u.protocol === 'https:';
  } catch {
    return false;
  }
}

/** Origin plus path, without query or fragment, for log lines. */
export function describeUrl(input: string): string {
  try {
    const u = new URL(input);
    return `${u.origin}${u.pathname}`;
  } catch {
    return input;
  }
}
