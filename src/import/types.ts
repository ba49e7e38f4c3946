export type FeedSpec = {
  readonly url: string;
  readonly categoryName: string | null;
  readonly title: string | null;
};

export type ImportItem =
  | { readonly url: string; readonly status: "added"; readonly feedId: number }
  | {
      readonly url: string;
      readonly status: "skipped";
      readonly reason: "duplicate_in_batch" | "already_exists";
    }
  | {
      readonly url: string;
      readonly status: "failed";
      readonly error: { readonly code: string; readonly message: string };
    };

export type ImportReport = {
  readonly added: number;
  readonly skipped: number;
  readonly failed: number;
  readonly items: ReadonlyArray<ImportItem>;
};
