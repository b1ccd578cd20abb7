/**
 * Shared fetch stubs for provider tests
 */

/**
 * Build a minimal fetch Response
 */
export function createMockResponse(
  data: unknown,
  ok = true,
  status = 200,
  json: () => Promise<unknown> = () => Promise.resolve(data)
): Response {
  return {
    ok,
    status,
    statusText: ok ? "OK" : "Error",
    json,
    headers: new Headers(),
    redirected: false,
    type: "basic",
    url: "",
    clone: () => createMockResponse(data, ok, status, json),
    body: null,
    bodyUsed: false,
    arrayBuffer: () => Promise.resolve(new ArrayBuffer(0)),
    blob: () => Promise.resolve(new Blob()),
    formData: () => Promise.resolve(new FormData()),
    text: () => Promise.resolve(JSON.stringify(data)),
  } as Response;
}

/**
 * A Response whose body is not JSON
 */
export function createInvalidJsonResponse(): Response {
  return createMockResponse(null, true, 200, () =>
    Promise.reject(new SyntaxError("Unexpected token < in JSON at position 0"))
  );
}

/**
 * Query parameters of the URL passed to a fetch call
 */
export function getRequestParams(url: unknown): URLSearchParams {
  return new URL(String(url)).searchParams;
}
