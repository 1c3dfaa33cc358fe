export type CompanyNews = {
  readonly ticker: string;
  readonly date: string;
  readonly headline: string;
  readonly summary: string;
  readonly source: string;
  readonly url: string;
  readonly author?: string;
  readonly sentiment?: string;
};
