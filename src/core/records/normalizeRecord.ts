import { MalformedRecordError } from "../errors/harvest.errors";
import { formatApiDate, sanitizeCount, sanitizeText } from "./sanitizeText";
import type { ContributorRow, FollowerRow, ForkRow, RawRecord, RepositoryContext } from "./record.types";

const requireText = (raw: RawRecord, field: string): string => {
  const value = raw[field];
  if (value == null) {
    throw new MalformedRecordError(`Invalid record: missing ${field}`);
  }

  const text = sanitizeText(value);
  if (text === "") {
    throw new MalformedRecordError(`Invalid record: ${field} is empty`);
  }
  return text;
};

/** Login of a listing entry, or undefined when the entry cannot identify a user. */
export const extractLogin = (raw: RawRecord): string | undefined => {
  const login = sanitizeText(raw.login);
  return login === "" ? undefined : login;
};

/**
 * Maps a `/users/{login}` profile to a follower row.
 * `company` loses its `@` handles and `created_at` is rendered as DD/MM/YYYY.
 */
export const normalizeFollower = (raw: RawRecord): FollowerRow => ({
  login: requireText(raw, "login"),
  name: sanitizeText(raw.name),
  company: sanitizeText(raw.company).replace(/@/g, "").replace(/ {2,}/g, " ").trim(),
  blog: sanitizeText(raw.blog),
  email: sanitizeText(raw.email),
  bio: sanitizeText(raw.bio),
  public_repos: sanitizeCount(raw.public_repos),
  followers: sanitizeCount(raw.followers),
  following: sanitizeCount(raw.following),
  created_at: formatApiDate(raw.created_at)
});

export const normalizeRepositoryContext = (raw: RawRecord): RepositoryContext => ({
  fullName: requireText(raw, "full_name"),
  description: sanitizeText(raw.description),
  stars: sanitizeCount(raw.stargazers_count),
  forks: sanitizeCount(raw.forks_count),
  openIssues: sanitizeCount(raw.open_issues_count),
  createdAt: formatApiDate(raw.created_at)
});

export const normalizeContributor = (raw: RawRecord, repository: RepositoryContext): ContributorRow => ({
  login: requireText(raw, "login"),
  contributions: sanitizeCount(raw.contributions),
  html_url: sanitizeText(raw.html_url),
  repository: repository.fullName,
  repo_description: repository.description,
  repo_stars: repository.stars,
  repo_forks: repository.forks,
  repo_open_issues: repository.openIssues,
  repo_created_at: repository.createdAt
});

export const isFork = (raw: RawRecord): boolean => raw.fork === true;

export const normalizeFork = (raw: RawRecord): ForkRow => ({
  full_name: requireText(raw, "full_name"),
  name: sanitizeText(raw.name),
  description: sanitizeText(raw.description),
  html_url: sanitizeText(raw.html_url),
  created_at: formatApiDate(raw.created_at),
  updated_at: formatApiDate(raw.updated_at)
});
