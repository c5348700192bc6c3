export interface MetaSyncTick {
  bid?: number;
  ask?: number;
  last?: number;
  time?: number;
  volume?: number;
}

export interface MetaSyncCandle {
  time: number;
  open: number;
  high: number;
  low: number;
  close: number;
  tick_volume?: number;
}

export interface MetaSyncConnectResponse {
  connected?: boolean;
  status?: string;
  login?: number;
  server?: string;
  message?: string;
}
