import type { NormalizedImage } from "../images/normalize";

/** A Drive file eligible for processing. Read-only to the pipeline. */
export type CandidateItem = {
  id: string;
  name: string;
  mimeType: string;
  modifiedTime: string;
  viewUrl?: string;
};

export type FoodRecord = {
  foodName: string;
  recipe?: string;
  photoUrl?: string;
  capturedAt: Date;
};

export type FoodDetection = { kind: "food"; name: string } | { kind: "no_food" };

export type ImageQuery = {
  folderId?: string;
  modifiedAfter: Date;
  maxResults: number;
};

export interface PhotoStorage {
  /** Images in the folder (if any), not trashed, modified after the cutoff, newest first. */
  listImages(query: ImageQuery): Promise<CandidateItem[]>;
  downloadBytes(id: string): Promise<Buffer>;
}

export interface FoodLog {
  ensureHeaderRow(): Promise<void>;
  appendRow(record: FoodRecord): Promise<void>;
  appendRows(records: FoodRecord[]): Promise<void>;
  readAllRows(): Promise<string[][]>;
}

export interface FoodAnalyzer {
  classifyFood(image: NormalizedImage): Promise<FoodDetection>;
  /** Rejects when no recipe could be produced; the pipeline logs the row without one. */
  generateRecipe(foodName: string): Promise<string>;
}
