import { describe, it, expect } from "vitest";
import { PassThrough, Readable } from "node:stream";
import { createCapturedStream } from "@bucketprune/core/test-utils";
import { createReadlinePrompt, createStreamReporter } from "./terminal.js";

describe("createStreamReporter", () => {
  it("routes info to stdout and warnings/errors to stderr", () => {
    const out = createCapturedStream();
    const err = createCapturedStream();
    const reporter = createStreamReporter(out.stream, err.stream);

    reporter.info("listing");
    reporter.info("");
    reporter.warn("careful");
    reporter.error("Error: broken");

    expect(out.text()).toBe("listing\n\n");
    expect(err.lines()).toEqual(["careful", "Error: broken"]);
  });
});

describe("createReadlinePrompt", () => {
  it("prints the question and returns the first line", async () => {
    const out = createCapturedStream();
    const confirm = createReadlinePrompt(Readable.from(["yes\nignored\n"]), out.stream);

    await expect(confirm("Proceed? (yes/no)")).resolves.toBe("yes");
    expect(out.text()).toBe("\nProceed? (yes/no)\n");
  });

  it("waits for input that arrives later", async () => {
    const input = new PassThrough();
    const confirm = createReadlinePrompt(input, createCapturedStream().stream);

    const answer = confirm("Proceed?");
    setTimeout(() => input.write("No\n"), 10);

    await expect(answer).resolves.toBe("No");
  });

  it("treats closed input as an empty answer", async () => {
    const confirm = createReadlinePrompt(Readable.from([]), createCapturedStream().stream);
    await expect(confirm("Proceed?")).resolves.toBe("");
  });
});
