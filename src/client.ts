import { ClobClient } from "@polymarket/clob-client";
import fs from "fs";
import { z } from "zod";
import {
  CLOB_API,
  CHAIN_ID,
  POLY_API_KEY,
  POLY_API_SECRET,
  POLY_API_PASSPHRASE,
  CREDS_FILE,
} from "./config";
import { getWallet } from "./wallet";
import { errorMessage } from "./errors";
import { writeJsonAtomic } from "./speed/persist";
import { createLogger } from "./logger";

const log = createLogger("client");

const ApiCredentialsSchema = z.object({
  key: z.string().min(1),
  secret: z.string().min(1),
  passphrase: z.string().min(1),
});

export type ApiCredentials = z.infer<typeof ApiCredentialsSchema>;

let clobClient: ClobClient | null = null;

function loadCachedCreds(): ApiCredentials | null {
  if (POLY_API_KEY && POLY_API_SECRET && POLY_API_PASSPHRASE) {
    return {
      key: POLY_API_KEY,
      secret: POLY_API_SECRET,
      passphrase: POLY_API_PASSPHRASE,
    };
  }
  try {
    if (fs.existsSync(CREDS_FILE)) {
      const parsed = ApiCredentialsSchema.safeParse(JSON.parse(fs.readFileSync(CREDS_FILE, "utf-8")));
      if (parsed.success) return parsed.data;
      log.warn("Cached API credentials are malformed, deriving fresh ones");
    }
  } catch (e) {
    log.warn("Failed to load cached API credentials", { error: errorMessage(e) });
  }
  return null;
}

function saveCreds(creds: ApiCredentials): void {
  writeJsonAtomic(CREDS_FILE, creds);
  log.info("API credentials cached to disk");
}

export async function getClobClient(): Promise<ClobClient> {
  if (clobClient) return clobClient;

  const wallet = getWallet();
  const cached = loadCachedCreds();

  if (cached) {
    log.info("Using cached API credentials");
    clobClient = new ClobClient(CLOB_API, CHAIN_ID, wallet, cached, 0); // SignatureType EOA
    return clobClient;
  }

  // Derive or create API key
  log.info("Deriving API credentials from wallet...");
  const tempClient = new ClobClient(CLOB_API, CHAIN_ID, wallet);
  const creds = ApiCredentialsSchema.parse(await tempClient.createOrDeriveApiKey());
  saveCreds(creds);

  clobClient = new ClobClient(CLOB_API, CHAIN_ID, wallet, creds, 0); // SignatureType EOA

  log.info("CLOB client initialized with fresh credentials");
  return clobClient;
}
