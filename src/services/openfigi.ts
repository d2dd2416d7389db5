import type { AxiosInstance } from "axios";
import { z } from "zod";
import { errorMessage } from "../errors.ts";
import { RateLimiter } from "./rate-limiter.ts";
import { createHttpClient, toSourceError } from "./sources/http.ts";

const FigiRecordSchema = z.object({
  figi: z.string(),
  name: z.string().nullish(),
  ticker: z.string().nullish(),
  exchCode: z.string().nullish(),
  compositeFIGI: z.string().nullish(),
  securityType: z.string().nullish(),
  marketSector: z.string().nullish(),
});

const MappingResponseSchema = z.array(
  z.object({
    data: z.array(FigiRecordSchema).optional(),
    error: z.string().optional(),
  })
);

export interface FigiMetadata {
  figi: string;
  name?: string;
  ticker?: string; // only for US composite listings, usable as a Yahoo symbol
  exchange?: string;
  securityType?: string;
  marketSector?: string;
}

/**
 * ISIN -> FIGI metadata via the OpenFIGI mapping API. Works without a key at
 * a lower rate limit.
 */
export class OpenFigiClient {
  private http: AxiosInstance;

  constructor(
    apiKey?: string,
    private readonly limiter: RateLimiter = new RateLimiter(1000),
    options: { http?: AxiosInstance; timeoutMs?: number } = {}
  ) {
    this.http =
      options.http ??
      createHttpClient({
        baseURL: "https://api.openfigi.com/v3",
        timeoutMs: options.timeoutMs,
        headers: apiKey
          ? { "Content-Type": "application/json", "X-OPENFIGI-APIKEY": apiKey }
          : { "Content-Type": "application/json" },
      });
  }

  async lookup(isin: string): Promise<FigiMetadata | null> {
    await this.limiter.wait();

    try {
      const response = await this.http.post("/mapping", [
        { idType: "ID_ISIN", idValue: isin },
      ]);
      const parsed = MappingResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        console.warn(`OpenFIGI: unexpected response for ${isin}`);
        return null;
      }

      const records = parsed.data[0]?.data ?? [];
      const first = records[0];
      if (!first) return null;

      const us = records.find((r) => r.exchCode === "US");
      const chosen = us ?? first;
      return {
        figi: chosen.figi,
        name: chosen.name ?? undefined,
        ticker: us?.ticker ?? undefined,
        exchange: chosen.exchCode ?? undefined,
        securityType: chosen.securityType ?? undefined,
        marketSector: chosen.marketSector ?? undefined,
      };
    } catch (error) {
      console.warn(`OpenFIGI lookup failed for ${isin}: ${errorMessage(toSourceError("OpenFIGI", error))}`);
      return null;
    }
  }
}
