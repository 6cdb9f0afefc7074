import { Test, TestingModule } from "@nestjs/testing";
import { AxiosError } from "axios";
import { QUEUE_TIMES_HTTP, QueueTimesClient } from "./queue-times.client";
import { collectorConfig } from "../../config/collector.config";
import { ConfigurationError } from "../../common/errors/collector.errors";
import {
  createFlatResponse,
  createNestedResponse,
  createTestCollectorConfig,
  errorResponse,
  okResponse,
} from "../../../test/fixtures/queue-times.fixtures";

describe("QueueTimesClient", () => {
  let client: QueueTimesClient;
  const get = jest.fn();

  const createClient = async (retryBaseDelayMs = 0): Promise<void> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        QueueTimesClient,
        { provide: QUEUE_TIMES_HTTP, useValue: { get } },
        {
          provide: collectorConfig.KEY,
          useValue: createTestCollectorConfig({ retryBaseDelayMs }),
        },
      ],
    }).compile();

    client = module.get<QueueTimesClient>(QueueTimesClient);
  };

  beforeEach(async () => {
    await createClient();
  });

  afterEach(() => {
    jest.resetAllMocks();
    jest.restoreAllMocks();
  });

  describe("fetchParkQueueTimes", () => {
    it("should return the nested snapshot on success", async () => {
      const body = createNestedResponse(64);
      get.mockResolvedValueOnce(okResponse(body));

      const result = await client.fetchParkQueueTimes(64);

      expect(get).toHaveBeenCalledWith("/parks/64/queue_times.json");
      expect(result).toEqual({
        ok: true,
        attempts: 1,
        snapshot: { parkId: 64, lands: body.lands, rides: [] },
      });
    });

    it("should accept a flat response without lands", async () => {
      const body = createFlatResponse(65);
      get.mockResolvedValueOnce(okResponse(body));

      const result = await client.fetchParkQueueTimes(65);

      expect(result).toEqual({
        ok: true,
        attempts: 1,
        snapshot: { parkId: 65, lands: [], rides: body.rides },
      });
    });

    it("should treat null lands as absent", async () => {
      get.mockResolvedValueOnce(okResponse({ lands: null, rides: [] }));

      const result = await client.fetchParkQueueTimes(64);

      expect(result).toEqual({
        ok: true,
        attempts: 1,
        snapshot: { parkId: 64, lands: [], rides: [] },
      });
    });

    it("should throw for an untracked park before any request", async () => {
      await expect(client.fetchParkQueueTimes(999)).rejects.toThrow(
        new ConfigurationError("Park 999 is not a tracked park"),
      );
      expect(get).not.toHaveBeenCalled();
    });

    it("should retry server errors and succeed", async () => {
      get
        .mockResolvedValueOnce(errorResponse(503))
        .mockResolvedValueOnce(okResponse(createFlatResponse(64)));

      const result = await client.fetchParkQueueTimes(64);

      expect(get).toHaveBeenCalledTimes(2);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.attempts).toBe(2);
      }
    });

    it("should give up after the configured number of timeouts", async () => {
      get.mockRejectedValue(
        new AxiosError("timeout of 30000ms exceeded", "ECONNABORTED"),
      );

      const result = await client.fetchParkQueueTimes(64);

      expect(get).toHaveBeenCalledTimes(3);
      expect(result).toEqual({
        ok: false,
        failure: {
          kind: "network",
          parkId: 64,
          attempts: 3,
          cause: "Request timed out - timeout of 30000ms exceeded",
        },
      });
    });

    it("should back off exponentially between attempts", async () => {
      await createClient(10);
      const setTimeoutSpy = jest.spyOn(global, "setTimeout");
      get.mockResolvedValue(errorResponse(502));

      const result = await client.fetchParkQueueTimes(64);

      expect(setTimeoutSpy).toHaveBeenCalledWith(expect.any(Function), 10);
      expect(setTimeoutSpy).toHaveBeenCalledWith(expect.any(Function), 20);
      expect(result).toEqual({
        ok: false,
        failure: {
          kind: "network",
          parkId: 64,
          attempts: 3,
          status: 502,
          cause: "Server error (HTTP 502)",
        },
      });
    });

    it("should not retry client errors", async () => {
      get.mockResolvedValue(errorResponse(404));

      const result = await client.fetchParkQueueTimes(64);

      expect(get).toHaveBeenCalledTimes(1);
      expect(result).toEqual({
        ok: false,
        failure: {
          kind: "network",
          parkId: 64,
          attempts: 1,
          status: 404,
          cause: "Request rejected (HTTP 404)",
        },
      });
    });

    it("should describe connection errors by their code", async () => {
      get
        .mockRejectedValueOnce(
          new AxiosError("connect ECONNREFUSED 127.0.0.1:80", "ECONNREFUSED"),
        )
        .mockRejectedValueOnce(new Error("socket hang up"))
        .mockRejectedValueOnce(
          new AxiosError("connect ECONNREFUSED 127.0.0.1:80", "ECONNREFUSED"),
        );

      const result = await client.fetchParkQueueTimes(64);

      expect(result).toEqual({
        ok: false,
        failure: {
          kind: "network",
          parkId: 64,
          attempts: 3,
          cause: "No response received - ECONNREFUSED",
        },
      });
    });

    it("should report a non-axios error as a failed request", async () => {
      get.mockRejectedValue(new Error("socket hang up"));

      const result = await client.fetchParkQueueTimes(64);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failure.cause).toBe("Request failed - socket hang up");
      }
    });
  });

  describe("response parsing", () => {
    it("should not retry a body that is not JSON", async () => {
      get.mockResolvedValue({ status: 200, data: "<html>maintenance</html>" });

      const result = await client.fetchParkQueueTimes(64);

      expect(get).toHaveBeenCalledTimes(1);
      expect(result).toEqual({
        ok: false,
        failure: {
          kind: "parse",
          parkId: 64,
          cause: expect.stringMatching(/^Response body is not valid JSON - /),
        },
      });
    });

    it.each([
      ["[]", "Response body is not a JSON object"],
      ["{}", 'Response has neither "lands" nor "rides"'],
      ['{"lands":{}}', '"lands" is not an array'],
      ['{"lands":[],"rides":"none"}', '"rides" is not an array'],
    ])("should reject %s", async (data, cause) => {
      get.mockResolvedValue({ status: 200, data });

      const result = await client.fetchParkQueueTimes(64);

      expect(result).toEqual({
        ok: false,
        failure: { kind: "parse", parkId: 64, cause },
      });
    });
  });
});
