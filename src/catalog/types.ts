import type { CatalogRecord } from "../photo/tags/types.js";

export type CatalogConnection = {
  server: string; // API base URL, e.g. https://camerahub.info/api
  username: string;
  password: string;
};

export type CatalogApi = {
  testCredentials(): Promise<boolean>;
  resolveNegative(film: string, frame: string): Promise<string>;
  createScan(negative: string, filename: string, date: string): Promise<string>;
  fetchScan(scanId: string): Promise<CatalogRecord>;
};
