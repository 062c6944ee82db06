// Only RFC 3986 unreserved characters stay literal; encodeURIComponent also keeps !'()*.
function quoteSegment(segment: string): string {
  return encodeURIComponent(segment).replace(/[!'()*]/g, (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`);
}

// Form encoding for query values: same as quoteSegment, with spaces as '+'.
function quotePlus(value: string): string {
  return quoteSegment(value).replace(/%20/g, '+');
}

export function trimSlashes(path: string): string {
  return path.replace(/^\/+/, '').replace(/\/+$/, '');
}

export function encodeDatastorePath(path: string): string {
  return trimSlashes(path).split('/').map(quoteSegment).join('/');
}

export function buildFolderPath(input: { datastore: string; datacenter: string; path: string }): string {
  const folderPath = `/folder/${encodeDatastorePath(input.path)}`;

  // vSphere fails on '&' in datacenter names; its own datastore browser double-encodes them.
  const datacenter = input.datacenter.replace(/&/g, '%26');

  const query = [`dsName=${quotePlus(input.datastore)}`];
  if (datacenter) query.push(`dcPath=${quotePlus(datacenter)}`);
  return `${folderPath}?${query.join('&')}`;
}

export function buildDatastoreSpec(input: { datastore: string; path: string }): string {
  return `[${input.datastore}] ${encodeDatastorePath(input.path)}`;
}

export function buildBaseUrl(host: string, port = 443): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  return port === 443 ? `https://${trimmed}` : `https://${trimmed}:${port}`;
}
