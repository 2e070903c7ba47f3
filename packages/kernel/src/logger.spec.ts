import { Logger } from "./logger.js";

function captureStream(): {
  stream: { write(line: string): void };
  lines: () => Array<Record<string, unknown>>;
} {
  const chunks: string[] = [];
  return {
    stream: {
      write(line: string) {
        chunks.push(line);
      },
    },
    lines: () =>
      chunks
        .join("")
        .split("\n")
        .filter((line) => line.length > 0)
        .map((line) => JSON.parse(line) as Record<string, unknown>),
  };
}

describe("Logger", () => {
  afterEach(() => {
    Logger.configure({ level: "silent" });
  });

  it("should return the same logger for the same name", () => {
    expect(Logger.for("Same")).toBe(Logger.for("Same"));
  });

  it("should bind the module name and merge objects", () => {
    const capture = captureStream();
    Logger.configure({ level: "info", destination: capture.stream });

    Logger.for("ViewActor").info({ componentId: "c1" }, "mounted");

    const [line] = capture.lines();
    expect(line).toMatchObject({
      name: "stitchview",
      component: "ViewActor",
      componentId: "c1",
      msg: "mounted",
    });
  });

  it("should apply a new level to loggers handed out earlier", () => {
    const capture = captureStream();
    Logger.configure({ level: "info", destination: capture.stream });
    const log = Logger.for("Levels");

    log.debug("hidden");
    Logger.configure({ level: "debug" });
    log.debug("shown");

    expect(capture.lines().map((line) => line["msg"])).toEqual(["shown"]);
    expect(Logger.level).toBe("debug");
  });
});
