import "dotenv/config";
import path from "path";

// ─── Env vars ───

export const LOG_LEVEL = process.env.LOG_LEVEL || "info";
export const PRIVATE_KEY = process.env.PRIVATE_KEY || "";
export const POLY_API_KEY = process.env.POLY_API_KEY || "";
export const POLY_API_SECRET = process.env.POLY_API_SECRET || "";
export const POLY_API_PASSPHRASE = process.env.POLY_API_PASSPHRASE || "";

// ─── Polymarket ───

export const GAMMA_API = "https://gamma-api.polymarket.com";
export const CLOB_API = "https://clob.polymarket.com";
export const CHAIN_ID = 137; // Polygon mainnet

// ─── Polygon ───

export const POLYGON_RPC = process.env.POLYGON_RPC || "https://polygon-rpc.com";
export const USDC_ADDRESS = "0x2791Bca1f2de4661ED88A30C99A7a9449Aa84174"; // USDC.e

// ─── State file paths ───

export const STATE_DIR = process.env.STATE_DIR || path.join(__dirname, "..", "state");
export const CREDS_FILE = path.join(STATE_DIR, "api-creds.json");
