import { ethers, Contract, Wallet } from "ethers";
import { PRIVATE_KEY, POLYGON_RPC, USDC_ADDRESS } from "./config";

const ERC20_ABI = [
  "function balanceOf(address) view returns (uint256)",
  "function decimals() view returns (uint8)",
];

let provider: ethers.providers.JsonRpcProvider | null = null;
let wallet: Wallet | null = null;

export function getProvider(): ethers.providers.JsonRpcProvider {
  if (!provider) {
    provider = new ethers.providers.JsonRpcProvider(POLYGON_RPC);
  }
  return provider;
}

export function getWallet(): Wallet {
  if (!wallet) {
    wallet = new Wallet(PRIVATE_KEY, getProvider());
  }
  return wallet;
}

export async function getUsdcBalance(): Promise<number> {
  const usdc = new Contract(USDC_ADDRESS, ERC20_ABI, getProvider());
  const balance: unknown = await usdc.balanceOf(getWallet().address);
  if (!ethers.BigNumber.isBigNumber(balance)) {
    throw new Error("Unexpected balanceOf response");
  }
  // USDC.e has 6 decimals
  return parseFloat(ethers.utils.formatUnits(balance, 6));
}
