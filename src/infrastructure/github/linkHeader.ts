/**
 * Parses an RFC 8288 Link header into a rel → URL map, e.g.
 * `<https://api.github.com/user/1/followers?page=2>; rel="next", <...>; rel="last"`.
 */
export const parseLinkHeader = (header: string | undefined): Record<string, string> => {
  const links: Record<string, string> = {};
  if (!header) return links;

  for (const part of header.split(",")) {
    const match = /<([^>]*)>\s*;(.*)/.exec(part.trim());
    if (!match) continue;

    const [, url, params] = match;
    const rel = /rel="?([^";]+)"?/.exec(params);
    if (!rel) continue;

    for (const name of rel[1].trim().split(/\s+/)) {
      links[name] = url;
    }
  }

  return links;
};
