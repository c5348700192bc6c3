export interface Quote {
  symbol: string;
  price: number;
  dailyChangePct: number;
  timestamp: Date;
}
