/** Where the load reads from. Resolved once into a `DataSource`. */
export type SourceSpec =
  | { readonly kind: 'path'; readonly path: string }
  | { readonly kind: 'url'; readonly url: string }
  | { readonly kind: 'stdin' };

/** Map a command-line source argument: none → stdin, `http(s)://` → url, anything else → path. */
export function resolveSourceSpec(arg?: string): SourceSpec {
  if (arg === undefined || arg === '' || arg === '-') {
    return { kind: 'stdin' };
  }
  if (arg.startsWith('http://') || arg.startsWith('https://')) {
    return { kind: 'url', url: arg };
  }
  return { kind: 'path', path: arg };
}

export function describeSource(spec: SourceSpec): string {
  switch (spec.kind) {
    case 'path':
      return spec.path;
    case 'url':
      return spec.url;
    case 'stdin':
      return 'stdin';
  }
}
