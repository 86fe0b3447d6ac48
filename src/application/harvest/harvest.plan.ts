import { MalformedRecordError } from "../../core/errors/harvest.errors";
import {
  extractLogin,
  isFork,
  normalizeContributor,
  normalizeFollower,
  normalizeFork,
  normalizeRepositoryContext
} from "../../core/records/normalizeRecord";
import { contributorColumns, followerColumns, forkColumns, type RawRecord } from "../../core/records/record.types";
import type { FetchTarget } from "../../core/target/fetchTarget";
import type { CsvRow } from "../../ports/ExportSink";
import type { PageSource } from "../../ports/PageSource";

export type ListingDecision =
  | { action: "write"; row: CsvRow }
  | { action: "detail"; login: string }
  | { action: "filter"; code: "not_a_fork" };

/**
 * What one target needs beyond the generic crawl: where it is written, its
 * columns, and how a listing entry (and, for followers, a profile) becomes
 * a row. Built after the preflight lookup.
 */
export type HarvestPlan = {
  fileName: string;
  columns: readonly string[];
  hasDetailPhase: boolean;
  decide(raw: RawRecord): ListingDecision;
  normalizeDetail(raw: RawRecord): CsvRow;
};

const toFileSegment = (value: string): string => value.replace(/[^A-Za-z0-9._-]/g, "_");

export const exportFileName = (target: FetchTarget): string => {
  switch (target.kind) {
    case "followers":
      return `github_followers_${toFileSegment(target.username)}.csv.gz`;
    case "contributors":
      return `github_repo_contributions_${toFileSegment(target.owner)}_${toFileSegment(target.repo)}.csv.gz`;
    case "forks":
      return `github_forks_${toFileSegment(target.username)}.csv.gz`;
  }
};

const noDetailPhase = (): CsvRow => {
  throw new Error("This target has no detail phase");
};

/**
 * Verifies that the user or repository exists (a 404 surfaces as
 * NotFoundError) and builds the plan for the target.
 */
export const prepareHarvest = async (target: FetchTarget, source: PageSource): Promise<HarvestPlan> => {
  const fileName = exportFileName(target);

  switch (target.kind) {
    case "followers":
      await source.fetchUser(target.username);
      return {
        fileName,
        columns: followerColumns,
        hasDetailPhase: true,
        decide: (raw) => {
          const login = extractLogin(raw);
          if (login == null) throw new MalformedRecordError("Invalid record: missing login");
          return { action: "detail", login };
        },
        normalizeDetail: normalizeFollower
      };

    case "contributors": {
      const repository = normalizeRepositoryContext(await source.fetchRepository(target.owner, target.repo));
      return {
        fileName,
        columns: contributorColumns,
        hasDetailPhase: false,
        decide: (raw) => ({ action: "write", row: normalizeContributor(raw, repository) }),
        normalizeDetail: noDetailPhase
      };
    }

    case "forks":
      await source.fetchUser(target.username);
      return {
        fileName,
        columns: forkColumns,
        hasDetailPhase: false,
        decide: (raw) => (isFork(raw) ? { action: "write", row: normalizeFork(raw) } : { action: "filter", code: "not_a_fork" }),
        normalizeDetail: noDetailPhase
      };
  }
};
