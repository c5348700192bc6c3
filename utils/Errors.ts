export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// Raised by a quote source when a symbol has no usable data this cycle
export class DataUnavailableError extends Error {
  symbol: string;

  constructor(symbol: string, message: string) {
    super(`${symbol}: ${message}`);
    this.name = "DataUnavailableError";
    this.symbol = symbol;
  }
}
