import chalk from "chalk";
import { ConsoleProgress } from "./console-progress";
import { CaptureStream } from "../__tests__/capture-stream";

describe("ConsoleProgress", () => {
  let out: CaptureStream;

  beforeEach(() => {
    chalk.level = 0;
    out = new CaptureStream();
  });

  it("prints the banner, a dot per tick and done", () => {
    const progress = new ConsoleProgress("Waiting for ssh access...", out);

    progress.tick();
    progress.tick();
    progress.done();

    expect(out.text).toBe("Waiting for ssh access.....done\n");
  });

  it("writes nothing until the wait reports", () => {
    new ConsoleProgress("Waiting for instance to reach running state...", out);

    expect(out.text).toBe("");
  });

  it("prints the banner once when the first attempt succeeds", () => {
    const progress = new ConsoleProgress("Waiting for ssh access...", out);

    progress.done();

    expect(out.text).toBe("Waiting for ssh access...done\n");
  });
});
