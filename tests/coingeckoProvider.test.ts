import { describe, it, expect, vi } from "vitest";
import { AxiosError, AxiosHeaders } from "axios";
import { CoinGeckoProvider, parseMarkets } from "../src/market/coingeckoProvider.js";
import { UniverseFetchError } from "../src/utils/errors.js";

const BASE = "https://api.coingecko.test/api/v3";

function httpError(status: number): AxiosError {
  return new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_RESPONSE", undefined, undefined, {
    status,
    data: {},
    statusText: "",
    headers: {},
    config: { headers: new AxiosHeaders() },
  });
}

function setup() {
  const get = vi.fn();
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const provider = new CoinGeckoProvider({ http: { get }, baseUrl: BASE, maxRetries: 3, initialDelayMs: 100, sleep });
  return { get, sleep, provider };
}

describe("parseMarkets", () => {
  it("upper-cases symbols and falls back to the symbol for a missing name", () => {
    expect(parseMarkets([{ symbol: "btc", name: "Bitcoin" }, { symbol: "eth", name: "" }, { id: "nothing" }])).toEqual([
      { symbol: "BTC", name: "Bitcoin" },
      { symbol: "ETH", name: "ETH" },
    ]);
  });

  it("rejects a non-array payload", () => {
    expect(() => parseMarkets({ error: "rate limited" })).toThrow("Invalid /coins/markets response");
  });
});

describe("CoinGeckoProvider", () => {
  it("asks for the top coins by market cap, capped at one page", async () => {
    const { get, provider } = setup();
    get.mockResolvedValueOnce({ data: [{ symbol: "btc", name: "Bitcoin" }] });

    await provider.topSymbols(300);

    expect(get).toHaveBeenCalledWith(`${BASE}/coins/markets`, {
      params: { vs_currency: "usd", order: "market_cap_desc", per_page: 250, page: 1 },
      signal: undefined,
    });
  });

  it("backs off and retries on 429", async () => {
    const { get, sleep, provider } = setup();
    get.mockRejectedValueOnce(httpError(429));
    get.mockResolvedValueOnce({ data: [{ symbol: "btc", name: "Bitcoin" }] });

    await expect(provider.topSymbols(10)).resolves.toEqual([{ symbol: "BTC", name: "Bitcoin" }]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100]);
  });

  it("gives up after the last retry", async () => {
    const { get, sleep, provider } = setup();
    get.mockRejectedValue(httpError(503));

    const failure = provider.topSymbols(10);
    await expect(failure).rejects.toBeInstanceOf(UniverseFetchError);
    await expect(failure).rejects.toMatchObject({ attempts: 3 });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it("does not retry a client error", async () => {
    const { get, sleep, provider } = setup();
    get.mockRejectedValueOnce(httpError(404));

    await expect(provider.topSymbols(10)).rejects.toMatchObject({ attempts: 1 });
    expect(sleep).not.toHaveBeenCalled();
    expect(get).toHaveBeenCalledTimes(1);
  });

  it("stops retrying once the caller aborts", async () => {
    const { get, sleep, provider } = setup();
    const controller = new AbortController();
    get.mockImplementationOnce(async () => {
      controller.abort();
      throw httpError(503);
    });

    const failure = provider.topSymbols(10, controller.signal);
    await expect(failure).rejects.toBeInstanceOf(UniverseFetchError);
    await expect(failure).rejects.toMatchObject({ attempts: 1 });
    expect(sleep).not.toHaveBeenCalled();
    expect(get).toHaveBeenCalledTimes(1);
    expect(get.mock.calls[0][1].signal).toBe(controller.signal);
  });

  it("makes no request when already aborted", async () => {
    const { get, provider } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(provider.topSymbols(10, controller.signal)).rejects.toMatchObject({ attempts: 0 });
    expect(get).not.toHaveBeenCalled();
  });

  it("does not retry a malformed payload", async () => {
    const { get, provider } = setup();
    get.mockResolvedValueOnce({ data: { status: "error" } });

    await expect(provider.topSymbols(10)).rejects.toMatchObject({ attempts: 1 });
  });
});
