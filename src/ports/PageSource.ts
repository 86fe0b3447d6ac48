import type { Page, RawRecord } from "../core/records/record.types";
import type { FetchTarget } from "../core/target/fetchTarget";

export interface PageSource {
  fetchPage(target: FetchTarget, continuationToken?: string): Promise<Page>;
  fetchUser(login: string): Promise<RawRecord>;
  fetchRepository(owner: string, repo: string): Promise<RawRecord>;
}
