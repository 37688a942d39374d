import { StageFailedError } from "../lib/pipeline-errors";

describe("Stage failure errors", () => {
  it("names the stage, command and exit code", () => {
    const e = new StageFailedError("alignment", "bwa index ref.fa", 1, "");

    expect(e.message).toBe("Stage 'alignment' failed running 'bwa index ref.fa' (exit code 1)");
    expect(e.name).toBe("StageFailedError");
    expect(e.summary()).toBe(e.message);
  });

  it("summarises with the tail of stderr", () => {
    const e = new StageFailedError(
      "realignment",
      "java -jar gatk.jar",
      null,
      "INFO starting\nWARN something\n\nERROR no such file   \n"
    );

    expect(e.summary(2)).toBe(
      "Stage 'realignment' failed running 'java -jar gatk.jar' (exit code unknown)\n  WARN something\n  ERROR no such file"
    );
  });
});
