// pattern: Functional Core

/**
 * Shared types for the Igloo client.
 * Everything above the normalizer sees only these shapes, never the platform's
 * raw JSON.
 */

export const APPLICATION_TYPES = {
  blog: 1,
  wiki: 2,
  document: 3,
  forum: 4,
  gallery: 5,
  calendar: 6,
  pages: 7,
  people: 8,
  space: 9,
  microblog: 10,
} as const;

export type ApplicationName = keyof typeof APPLICATION_TYPES;

export const UPDATED_WITHIN = {
  past_hour: "pastHour",
  past_24_hours: "pastTwentyFourHours",
  past_week: "pastWeek",
  past_month: "pastMonth",
  past_year: "pastYear",
} as const;

export type UpdatedWithin = keyof typeof UPDATED_WITHIN;

export type DateRange = {
  readonly start?: string;
  readonly end?: string;
};

export type SearchQuery = {
  readonly term?: string;
  readonly applications?: ReadonlyArray<ApplicationName>;
  readonly dateRange?: DateRange;
  readonly updatedWithin?: UpdatedWithin;
  readonly parentPaths?: ReadonlyArray<string>;
  readonly matchAll?: boolean;
  readonly includeMicroblog?: boolean;
  readonly includeArchived?: boolean;
  readonly pageSize?: number;
  readonly pageToken?: string;
};

export type SearchHit = {
  readonly id: string;
  readonly title: string;
  readonly url: string;
  readonly application: string;
  readonly parentPath: string;
  readonly lastModified: string | null;
  readonly excerpt?: string;
  readonly views?: number;
  readonly comments?: number;
  readonly likes?: number;
  readonly labels?: ReadonlyArray<string>;
  readonly recommended?: boolean;
  readonly archived?: boolean;
};

export type SearchResult = {
  readonly hits: ReadonlyArray<SearchHit>;
  readonly nextPageToken?: string;
  readonly totalFound?: number;
};

export type FetchRequest = {
  readonly id?: string;
  readonly url?: string;
  readonly startIndex?: number;
};

export type PagePayload = {
  readonly url: string;
  readonly title: string;
  readonly html: string;
  readonly lastModified: string | null;
};

export type MemberHit = {
  readonly id: string;
  readonly fullName: string;
  readonly email: string;
  readonly username: string;
  readonly profileUrl: string;
};

export type ProfileField = {
  readonly label: string;
  readonly value: string;
};

export type MemberProfile = MemberHit & {
  readonly managerName?: string;
  readonly fields: ReadonlyArray<ProfileField>;
};

export interface IglooClient {
  readonly community: string;
  search(query: SearchQuery, signal?: AbortSignal): Promise<SearchResult>;
  fetchPage(request: FetchRequest, signal?: AbortSignal): Promise<PagePayload>;
  searchMembers(query: string, limit: number, signal?: AbortSignal): Promise<ReadonlyArray<MemberHit>>;
  getMemberProfile(id: string, signal?: AbortSignal): Promise<MemberProfile>;
}

export type Logger = Pick<Console, "warn" | "error">;

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;
