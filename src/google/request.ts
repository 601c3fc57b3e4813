import { UpstreamError, WorkspaceError, errorMessage } from "../errors.js";

function statusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("response" in error)) {
    return undefined;
  }
  const response = error.response;
  if (
    typeof response === "object" &&
    response !== null &&
    "status" in response &&
    typeof response.status === "number"
  ) {
    return response.status;
  }
  return undefined;
}

/** Run a Google API request, rethrowing transport and HTTP failures as `UpstreamError`. */
export async function callGoogle<T>(what: string, request: () => Promise<T>): Promise<T> {
  try {
    return await request();
  } catch (error) {
    if (error instanceof WorkspaceError) throw error;
    throw new UpstreamError(`${what} failed: ${errorMessage(error)}`, statusOf(error));
  }
}

/** googleapis models absent fields as `null`; the gateway types use `undefined`. */
export function opt<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

/** Map over `items` with at most `size` calls in flight, keeping input order. */
export async function inBatches<T, R>(
  items: readonly T[],
  size: number,
  fn: (item: T) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  for (let i = 0; i < items.length; i += size) {
    results.push(...(await Promise.all(items.slice(i, i + size).map(fn))));
  }
  return results;
}
