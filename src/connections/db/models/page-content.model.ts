// PageContent Model - collection "pagecontent"

export interface PageContent {
  key: string; // e.g. tos, rules, privacy
  title: string;
  content: string;
}
