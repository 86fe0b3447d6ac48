export type HarvestKind = "followers" | "contributors" | "forks";

export type FetchTarget =
  | { readonly kind: "followers"; readonly username: string }
  | { readonly kind: "contributors"; readonly owner: string; readonly repo: string }
  | { readonly kind: "forks"; readonly username: string };

export const harvestKinds: readonly HarvestKind[] = ["followers", "contributors", "forks"];

const isHarvestKind = (value: string): value is HarvestKind =>
  (harvestKinds as readonly string[]).includes(value);

// GitHub logins and repository names never contain "/" or whitespace.
const identityPattern = /^[A-Za-z0-9._-]+$/;

const assertIdentity = (label: string, value: string): string => {
  const trimmed = value.trim();
  if (!identityPattern.test(trimmed)) {
    throw new Error(`${label} must match ${identityPattern.source}. Received: ${value}`);
  }
  return trimmed;
};

/**
 * Parses the textual target form used by the CLI:
 * `followers:<user>`, `contributors:<owner>/<repo>`, `forks:<user>`.
 * A bare kind falls back to `defaultUsername` for the user-scoped kinds.
 */
export const parseFetchTarget = (input: string, defaultUsername?: string): FetchTarget => {
  const separator = input.indexOf(":");
  const kind = (separator === -1 ? input : input.slice(0, separator)).trim();
  const identity = separator === -1 ? defaultUsername ?? "" : input.slice(separator + 1);

  if (!isHarvestKind(kind)) {
    throw new Error(`Unknown harvest kind "${kind}". Expected one of: ${harvestKinds.join(", ")}`);
  }

  if (kind === "contributors") {
    const [owner, repo, ...rest] = identity.split("/");
    if (owner == null || repo == null || rest.length > 0) {
      throw new Error(`contributors target must look like contributors:<owner>/<repo>. Received: ${input}`);
    }
    return { kind, owner: assertIdentity("owner", owner), repo: assertIdentity("repo", repo) };
  }

  return { kind, username: assertIdentity("username", identity) };
};

export const describeTarget = (target: FetchTarget): string => {
  switch (target.kind) {
    case "contributors":
      return `contributors:${target.owner}/${target.repo}`;
    case "followers":
    case "forks":
      return `${target.kind}:${target.username}`;
  }
};
