export interface TokenRecord {
  id: number;
  address: string;
  chain: string;
  symbol: string | null;
  name: string | null;
  createdAt: Date;
}

export interface WalletRecord {
  id: number;
  address: string;
  chain: string;
  nickname: string | null;
  createdAt: Date;
}
