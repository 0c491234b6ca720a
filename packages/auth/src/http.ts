/**
 * Small helpers shared by the outbound HTTP clients
 */

/**
 * Describe a fetch rejection (network failure or timeout)
 */
export function describeFetchFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return `request timed out after ${timeoutMs}ms`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read a response body as JSON; undefined when it is not JSON
 * Rejects when the body stream fails (timeout or broken connection)
 */
export async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Response body text for diagnostics, truncated
 */
export async function readErrorBody(response: Response, limit = 200): Promise<string> {
  try {
    const text = await response.text();
    return text.length > limit ? `${text.substring(0, limit)}...` : text;
  } catch (error) {
    return `<unreadable body: ${error instanceof Error ? error.message : String(error)}>`;
  }
}
