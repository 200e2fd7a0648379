import { Logger, isLogLevel, type DestinationStream } from "./logger";
import { Context, type KernelContext } from "./context";

function captureStream(): { stream: DestinationStream; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    stream: {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  };
}

describe("Logger", () => {
  beforeEach(() => {
    Logger.reset();
  });

  afterAll(() => {
    Logger.reset();
  });

  describe("configuration", () => {
    it("should write structured lines to a destination", () => {
      const { stream, lines } = captureStream();
      Logger.configure({ level: "info", destination: stream });

      Logger.for("Composer").info({ nodeId: 3 }, "Node created");

      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatchObject({ msg: "Node created", nodeId: 3, component: "Composer" });
    });

    it("should configure log level", () => {
      Logger.configure({ level: "debug" });
      expect(Logger.level).toBe("debug");
    });

    it("should merge with earlier configuration", () => {
      const { stream, lines } = captureStream();
      Logger.configure({ level: "warn", destination: stream });
      Logger.configure({ level: "info" });

      Logger.for("Runtime").info("Hydrated");

      expect(lines[0]?.msg).toBe("Hydrated");
    });

    it("should read the default level from TESSEL_LOG_LEVEL", () => {
      vi.stubEnv("TESSEL_LOG_LEVEL", "warn");
      expect(Logger.level).toBe("warn");
      vi.unstubAllEnvs();
    });

    it("should ignore an unknown TESSEL_LOG_LEVEL", () => {
      vi.stubEnv("TESSEL_LOG_LEVEL", "loud");
      expect(Logger.level).toBe("info");
      vi.unstubAllEnvs();
    });

    it("should allow changing level at runtime", () => {
      const { stream, lines } = captureStream();
      Logger.configure({ level: "info", destination: stream });
      const log = Logger.for("Recomposer");

      log.debug("Hidden");
      Logger.setLevel("debug");
      log.debug("Shown");

      expect(Logger.level).toBe("debug");
      expect(lines.map((line) => line.msg)).toEqual(["Shown"]);
    });

    it("should recognise log level names", () => {
      expect(isLogLevel("silent")).toBe(true);
      expect(isLogLevel("verbose")).toBe(false);
      expect(isLogLevel(3)).toBe(false);
    });
  });

  describe("component loggers", () => {
    it("should use the constructor name for objects", () => {
      const { stream, lines } = captureStream();
      Logger.configure({ level: "info", destination: stream });

      class HeadManager {}
      Logger.for(new HeadManager()).info("Added");

      expect(lines[0]?.component).toBe("HeadManager");
    });

    it("should follow configuration made after the logger was created", () => {
      const log = Logger.for("Recomposer");
      const { stream, lines } = captureStream();

      Logger.configure({ level: "debug", destination: stream });
      log.debug("Pass scheduled");

      expect(lines).toHaveLength(1);
      expect(lines[0]?.component).toBe("Recomposer");
      expect(log.level).toBe("debug");
    });

    it("should merge bindings in chained child loggers", () => {
      const { stream, lines } = captureStream();
      Logger.configure({ level: "info", destination: stream });

      Logger.for("Hydration").child({ surface: "root" }).info("Bound");

      expect(lines[0]).toMatchObject({ component: "Hydration", surface: "root" });
    });
  });

  describe("context integration", () => {
    it("should work outside of context", () => {
      const { stream, lines } = captureStream();
      Logger.configure({ level: "info", destination: stream });

      Logger.for("Runtime").info("No context");

      expect(lines[0]?.request_id).toBeUndefined();
    });

    it("should inject context fields when available", () => {
      const { stream, lines } = captureStream();
      Logger.configure({ level: "info", destination: stream });

      const ctx: KernelContext = {
        requestId: "req-123",
        traceId: "trace-456",
        route: "/docs",
        metadata: {},
      };

      Context.run(ctx, () => {
        Logger.for("Renderer").info("With context");
      });

      expect(lines[0]).toMatchObject({
        request_id: "req-123",
        trace_id: "trace-456",
        route: "/docs",
      });
    });

    it("should skip context fields when includeContext is false", () => {
      const { stream, lines } = captureStream();
      Logger.configure({ level: "info", destination: stream, includeContext: false });

      Context.run(Context.create({ requestId: "req-1" }), () => {
        Logger.for("Renderer").info("Quiet");
      });

      expect(lines[0]?.request_id).toBeUndefined();
    });
  });

  describe("reset", () => {
    it("should drop configuration and fall back to the environment level", () => {
      Logger.configure({ level: "debug" });
      Logger.reset();
      expect(Logger.level).toBe("silent");
    });
  });
});
