/** Appends to the base URI's path; its query string and fragment stay in place. */
export function joinEndpoint(baseUri: string, resourcePath: string): string {
  const endpoint = new URL(baseUri);
  endpoint.pathname = `${endpoint.pathname.replace(/\/+$/, '')}/${resourcePath.replace(/^\/+/, '')}`;
  return endpoint.href;
}
