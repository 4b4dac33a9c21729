import { google, type sheets_v4 } from "googleapis";
import { z } from "zod";

import type { Listing } from "../types.js";
import { rowsToListings } from "./listing.js";

export interface ListingSource {
  fetchListings(): Promise<Listing[]>;
}

export type SheetsSourceOptions = {
  enabled: boolean;
  spreadsheetId: string;
  tab: string;
  credentialsJson: string;
};

const serviceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1)
});

async function getSheetsClient(credentialsJson: string): Promise<sheets_v4.Sheets> {
  if (!credentialsJson.trim()) {
    throw new Error("GOOGLE_CREDENTIALS_JSON is missing");
  }
  const credentials = serviceAccountSchema.parse(JSON.parse(credentialsJson));
  const auth = new google.auth.JWT({
    email: credentials.client_email,
    key: credentials.private_key.replace(/\\n/g, "\n"),
    scopes: ["https://www.googleapis.com/auth/spreadsheets.readonly"]
  });
  await auth.authorize();
  return google.sheets({ version: "v4", auth });
}

export class SheetsListingSource implements ListingSource {
  private client: sheets_v4.Sheets | undefined;

  constructor(private readonly options: SheetsSourceOptions) {}

  async fetchListings(): Promise<Listing[]> {
    if (!this.options.enabled) {
      return [];
    }
    if (!this.options.spreadsheetId) {
      throw new Error("GSHEET_ID is missing");
    }

    this.client ??= await getSheetsClient(this.options.credentialsJson);
    const response = await this.client.spreadsheets.values.get({
      spreadsheetId: this.options.spreadsheetId,
      range: this.options.tab,
      valueRenderOption: "FORMATTED_VALUE"
    });
    const values: unknown[][] = response.data.values ?? [];
    return rowsToListings(values);
  }
}

/** In-process source backing the tests. */
export class StaticListingSource implements ListingSource {
  calls = 0;
  failWith: Error | undefined;

  constructor(private listings: Listing[] = []) {}

  setListings(listings: Listing[]): void {
    this.listings = listings;
  }

  async fetchListings(): Promise<Listing[]> {
    this.calls += 1;
    if (this.failWith) {
      throw this.failWith;
    }
    return [...this.listings];
  }
}
