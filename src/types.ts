// Subset of a GitHub repository search result
export interface SearchItem {
  name: string;
  description?: string | null;
  owner: { login: string };
  html_url: string;
  stargazers_count: number;
  topics?: string[];
  language?: string | null;
}

export interface SearchResponse {
  total_count?: number;
  items?: SearchItem[];
}

export type RepoRecord = {
  name: string;
  description: string | null;
  owner: string;
  url: string;
  stars: number;
  topics: string[];
  lang: string;
};

export type OutputOptions = {
  json?: boolean;
  table?: boolean;
  csv?: boolean;
  quiet?: boolean;
};

export type GlobalOptions = OutputOptions & {
  debug?: boolean;
};
