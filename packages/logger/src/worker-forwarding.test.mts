import { beforeEach, expect, it, vi } from "vitest";
import { parentPort } from "node:worker_threads";

import { loggerFactory } from "./index.mjs";

vi.mock("node:worker_threads", () => ({
  isMainThread: false,
  parentPort: { postMessage: vi.fn() },
}));

const postMessageMock = () => {
  if (!parentPort) throw new Error("parentPort mock missing");
  return vi.mocked(parentPort.postMessage);
};

beforeEach(() => {
  postMessageMock().mockClear();
});

it("should post messages to the parent when forwarding from a worker", () => {
  const { logger } = loggerFactory({ level: "silent", forwardFromWorkers: true });
  logger.info("test message", { key: "value" });

  expect(postMessageMock()).toHaveBeenCalledWith({
    type: "message",
    level: "info",
    message: "test message",
    meta: { key: "value" },
  });
});

it("should write locally when forwarding is off", () => {
  const { logger } = loggerFactory({ level: "silent" });
  logger.warn("stays here");

  expect(postMessageMock()).not.toHaveBeenCalled();
});
