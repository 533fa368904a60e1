export const DEFAULT_FRONTEND_URL = 'http://localhost:5173';

/**
 * Build a link into the frontend, e.g. for verification emails.
 */
export function frontendLink(
  frontendUrl: string | undefined,
  path: string,
  params: Record<string, string> = {}
): string {
  const url = new URL(path, frontendUrl ?? DEFAULT_FRONTEND_URL);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}
