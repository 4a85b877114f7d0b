// Using vitest globals - see vitest.config.ts globals: true
import { RetryService } from "../../../src/utils/RetryService.js";
import {
  HellHubHttpError,
  HellHubNetworkError,
  HellHubTimeoutError,
  ValidationError,
} from "../../../src/utils/errors.js";

// Test helper to simulate multiple failures before success
function createMultiFailFunction<T>(
  failures: number,
  result: T,
  createError: () => unknown = () =>
    new HellHubNetworkError("Simulated network error")
): () => Promise<T> {
  let attempts = 0;

  return async () => {
    attempts++;
    if (attempts <= failures) {
      throw createError();
    }
    return result;
  };
}

describe("RetryService", () => {
  // Backoff delays run on fake timers so the suite does not sleep
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("execute method", () => {
    let retryService: RetryService;
    let onRetryMock: ReturnType<typeof vi.fn>;
    let delaysCollected: number[];

    beforeEach(() => {
      delaysCollected = [];
      onRetryMock = vi.fn(
        (_error: unknown, _attempt: number, delayMs: number) => {
          delaysCollected.push(delayMs);
        }
      );

      retryService = new RetryService({
        maxAttempts: 3,
        initialDelayMs: 10,
        maxDelayMs: 50,
        backoffFactor: 2,
        jitter: false, // Disable jitter for predictable tests
        onRetry: onRetryMock,
      });
    });

    it("should succeed on first attempt", async () => {
      const fn = vi.fn(async () => "success");

      const result = await retryService.execute(fn);

      expect(result).toBe("success");
      expect(fn).toHaveBeenCalledTimes(1);
      expect(onRetryMock).not.toHaveBeenCalled();
    });

    it("should retry and succeed after retries", async () => {
      const mockFn = vi.fn(createMultiFailFunction(2, "success"));

      const pending = retryService.execute(mockFn);
      await vi.runAllTimersAsync();

      await expect(pending).resolves.toBe("success");
      expect(mockFn).toHaveBeenCalledTimes(3); // 1 initial + 2 retries
      expect(onRetryMock).toHaveBeenCalledTimes(2);
      expect(delaysCollected).toEqual([10, 20]);
    });

    it("should throw if max retries are exceeded", async () => {
      const mockFn = vi.fn(createMultiFailFunction(5, "never reached"));

      const assertion = expect(retryService.execute(mockFn)).rejects.toThrow(
        "Simulated network error"
      );
      await vi.runAllTimersAsync();
      await assertion;

      expect(mockFn).toHaveBeenCalledTimes(4); // 1 initial + 3 retries
      expect(delaysCollected).toEqual([10, 20, 40]);
    });

    it("should not retry on non-retryable errors", async () => {
      const fn = vi.fn(async () => {
        throw new ValidationError("Non-retryable error");
      });

      await expect(retryService.execute(fn)).rejects.toThrow(
        "Non-retryable error"
      );
      expect(fn).toHaveBeenCalledTimes(1);
      expect(onRetryMock).not.toHaveBeenCalled();
    });

    it("should retry transient HTTP statuses only", async () => {
      const rateLimited = vi.fn(
        createMultiFailFunction(
          1,
          "ok",
          () => new HellHubHttpError("/war", 429, "Too Many Requests")
        )
      );
      const serverError = vi.fn(async () => {
        throw new HellHubHttpError("/war", 500, "Internal Server Error");
      });

      const pending = retryService.execute(rateLimited);
      await vi.runAllTimersAsync();
      await expect(pending).resolves.toBe("ok");
      expect(rateLimited).toHaveBeenCalledTimes(2);

      await expect(retryService.execute(serverError)).rejects.toThrow(
        HellHubHttpError
      );
      expect(serverError).toHaveBeenCalledTimes(1);
    });

    it("should retry timeouts", async () => {
      const mockFn = vi.fn(
        createMultiFailFunction(
          1,
          "late",
          () => new HellHubTimeoutError("/war", 1000)
        )
      );

      const pending = retryService.execute(mockFn);
      await vi.runAllTimersAsync();

      await expect(pending).resolves.toBe("late");
      expect(mockFn).toHaveBeenCalledTimes(2);
    });
  });

  describe("default retryable error check", () => {
    it("should retry HellHub network failures", async () => {
      const retryService = new RetryService({
        maxAttempts: 2,
        initialDelayMs: 10,
        jitter: false,
      });
      const mockFn = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new HellHubNetworkError("socket hang up"))
        .mockRejectedValueOnce(
          new HellHubHttpError("/war", 503, "Service Unavailable")
        )
        .mockResolvedValueOnce("recovered");

      const pending = retryService.execute(mockFn);
      await vi.runAllTimersAsync();

      await expect(pending).resolves.toBe("recovered");
      expect(mockFn).toHaveBeenCalledTimes(3);
    });

    it("should not retry a 404", async () => {
      const retryService = new RetryService({ maxAttempts: 2 });
      const notFound = vi.fn(async () => {
        throw new HellHubHttpError("/planets/9", 404, "Not Found");
      });

      await expect(retryService.execute(notFound)).rejects.toThrow(
        "Resource not found at /planets/9"
      );
      expect(notFound).toHaveBeenCalledTimes(1);
    });

    it("should not retry plain errors, whatever their message", async () => {
      const retryService = new RetryService({ maxAttempts: 2 });
      const fn = vi.fn(async () => {
        throw new Error("Service temporarily unavailable");
      });

      await expect(retryService.execute(fn)).rejects.toThrow(
        "Service temporarily unavailable"
      );
      expect(fn).toHaveBeenCalledTimes(1);
    });
  });

  it("should not retry at all when maxAttempts is 0", async () => {
    const retryService = new RetryService({ maxAttempts: 0 });
    const fn = vi.fn(async () => {
      throw new HellHubNetworkError("offline");
    });

    await expect(retryService.execute(fn)).rejects.toThrow("offline");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  describe("delay calculation", () => {
    it("should respect maxDelayMs", async () => {
      const delays: number[] = [];
      const retryService = new RetryService({
        maxAttempts: 4,
        initialDelayMs: 100,
        maxDelayMs: 300, // Cap at 300ms
        backoffFactor: 2,
        jitter: false,
        retryableErrorCheck: () => true,
        onRetry: (_error: unknown, _attempt: number, delayMs: number) => {
          delays.push(delayMs);
        },
      });

      const assertion = expect(
        retryService.execute(async () => {
          throw new Error("always failing");
        })
      ).rejects.toThrow("always failing");
      await vi.runAllTimersAsync();
      await assertion;

      expect(delays).toEqual([100, 200, 300, 300]);
    });

    it("should keep jittered delays within the computed bound", async () => {
      const delays: number[] = [];
      const retryService = new RetryService({
        maxAttempts: 3,
        initialDelayMs: 100,
        backoffFactor: 2,
        jitter: true,
        retryableErrorCheck: () => true,
        onRetry: (_error: unknown, _attempt: number, delayMs: number) => {
          delays.push(delayMs);
        },
      });

      const assertion = expect(
        retryService.execute(async () => {
          throw new Error("always failing");
        })
      ).rejects.toThrow("always failing");
      await vi.runAllTimersAsync();
      await assertion;

      expect(delays).toHaveLength(3);
      delays.forEach((delay, index) => {
        expect(delay).toBeGreaterThanOrEqual(0);
        expect(delay).toBeLessThanOrEqual(100 * 2 ** index);
      });
    });
  });
});
