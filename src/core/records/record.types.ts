export type RawRecord = Record<string, unknown>;

export type Page = {
  records: RawRecord[];
  // Absolute URL of the next page; absent on the last page.
  next?: string;
};

export const followerColumns = [
  "login",
  "name",
  "company",
  "blog",
  "email",
  "bio",
  "public_repos",
  "followers",
  "following",
  "created_at"
] as const;

export const contributorColumns = [
  "login",
  "contributions",
  "html_url",
  "repository",
  "repo_description",
  "repo_stars",
  "repo_forks",
  "repo_open_issues",
  "repo_created_at"
] as const;

export const forkColumns = ["full_name", "name", "description", "html_url", "created_at", "updated_at"] as const;

export type FollowerRow = Record<(typeof followerColumns)[number], string>;
export type ContributorRow = Record<(typeof contributorColumns)[number], string>;
export type ForkRow = Record<(typeof forkColumns)[number], string>;

export type NormalizedRecord = FollowerRow | ContributorRow | ForkRow;

/** Columns shared by every contributor row of one repository. */
export type RepositoryContext = {
  fullName: string;
  description: string;
  stars: string;
  forks: string;
  openIssues: string;
  createdAt: string;
};
