import { describe, expect, it } from "vitest";
import { ValidationError } from "./errors.js";
import {
  buildContainerArgs,
  buildSubmission,
  isValidWallTime,
  isTerminalState,
  parseJobState,
  parseSubmittedJobId,
  validateContainerOptions,
  validateJobRequest,
} from "./slurm.js";
import type { JobRequest, SlurmSettings } from "./types.js";

const slurm: SlurmSettings = {
  gpuPartition: "gpu",
  gpuConstraint: "gpu",
  volta32Constraint: "volta32",
  batchOutput: "%x-%j.out",
};

const LAUNCHER = "/scratch/users/jdoe/iris_singularity_tools/singularity_exec.sh";

function request(overrides: Partial<JobRequest> = {}): JobRequest {
  return {
    jobName: "train",
    cpus: 7,
    gpus: 1,
    mem: "32G",
    time: "01:00:00",
    mode: "interactive",
    volta32: false,
    schedulerArgs: [],
    command: "python",
    commandArgs: ["train.py", "--batch_size", "32"],
    ...overrides,
  };
}

describe("job request validation", () => {
  it.each([
    ["cpus=0", { cpus: 0 }],
    ["gpus=-1", { gpus: -1 }],
    ["mem without unit", { mem: "8" }],
    ["short time", { time: "1:00" }],
    ["fractional cpus", { cpus: 1.5 }],
    ["minutes out of range", { time: "01:60:00" }],
    ["empty job name", { jobName: "  " }],
    ["job name with a slash", { jobName: "a/b" }],
  ])("rejects %s", (_label, overrides) => {
    expect(() => validateJobRequest(request(overrides))).toThrow(ValidationError);
  });

  it("accepts scheduler unit grammar and normalizes the job name", () => {
    const valid = validateJobRequest(
      request({ jobName: "my job", mem: " 512M ", time: "2-00:00:00", gpus: 0 }),
    );
    expect(valid.jobName).toBe("my_job");
    expect(valid.mem).toBe("512M");
    expect(valid.time).toBe("2-00:00:00");
  });

  it("limits hours only when days are given", () => {
    expect(isValidWallTime("36:00:00")).toBe(true);
    expect(isValidWallTime("1-24:00:00")).toBe(false);
    expect(isValidWallTime("1-23:59:59")).toBe(true);
  });
});

describe("submission building", () => {
  it("builds a blocking srun through the container launcher", () => {
    const submission = buildSubmission(
      request({
        schedulerArgs: ["--qos=normal"],
        container: { image: "/p/img.sif", launcherPath: LAUNCHER, args: ["--nv"] },
      }),
      slurm,
    );

    expect(submission.mode).toBe("interactive");
    expect(submission.program).toBe("srun");
    expect(submission.remoteCommand).toBe(
      `srun -c 7 --time=01:00:00 --mem=32G -J train --qos=normal -p gpu -G 1 -C gpu bash ${LAUNCHER} --nv /p/img.sif python train.py --batch_size 32`,
    );
  });

  it("passes the launcher to sbatch as the job script in batch mode", () => {
    const submission = buildSubmission(
      request({
        mode: "batch",
        cpus: 2,
        volta32: true,
        container: { image: "/p/img.sif", launcherPath: LAUNCHER, args: [] },
        commandArgs: [],
      }),
      slurm,
    );

    expect(submission.program).toBe("sbatch");
    expect(submission.args).toEqual([
      "-N",
      "1",
      "--output=%x-%j.out",
      "-c",
      "2",
      "--time=01:00:00",
      "--mem=32G",
      "-J",
      "train",
      "-p",
      "gpu",
      "-G",
      "1",
      "-C",
      "gpu,volta32",
      LAUNCHER,
      "/p/img.sif",
      "python",
    ]);
  });

  it("wraps a bare command for sbatch", () => {
    const submission = buildSubmission(
      request({
        jobName: "demo",
        mode: "batch",
        cpus: 2,
        gpus: 0,
        mem: "4G",
        time: "00:30:00",
        command: "sleep",
        commandArgs: ["infinity"],
      }),
      slurm,
    );

    expect(submission.remoteCommand).toBe(
      "sbatch -N 1 --output=%x-%j.out -c 2 --time=00:30:00 --mem=4G -J demo '--wrap=sleep infinity'",
    );
  });

  it("quotes command arguments for the remote shell", () => {
    const submission = buildSubmission(
      request({ gpus: 0, command: "python", commandArgs: ["-c", "print('hi there')"] }),
      slurm,
    );
    expect(submission.remoteCommand).toBe(
      `srun -c 7 --time=01:00:00 --mem=32G -J train python -c 'print('"'"'hi there'"'"')'`,
    );
  });

  it("validates before building", () => {
    expect(() => buildSubmission(request({ mem: "8" }), slurm)).toThrow(ValidationError);
  });
});

describe("container arguments", () => {
  it("adds gpu support, environment overrides and bind mounts", () => {
    expect(
      buildContainerArgs({
        gpus: 1,
        singularityArgs: ["--cleanenv"],
        env: ["FOO=bar"],
        bindPaths: ["/scratch/users/jdoe"],
      }),
    ).toEqual([
      "--cleanenv",
      "--nv",
      "--env",
      "FOO=bar",
      "--bind",
      "/scratch/users/jdoe:/scratch/users/jdoe",
    ]);
  });

  it("does not repeat --nv", () => {
    expect(buildContainerArgs({ gpus: 2, singularityArgs: ["--nv"], env: [], bindPaths: [] })).toEqual(
      ["--nv"],
    );
  });

  it("rejects malformed environment overrides and a missing image", () => {
    expect(() => validateContainerOptions({ image: "/p/img.sif", env: ["=bar"] })).toThrow(
      ValidationError,
    );
    expect(() => validateContainerOptions({ image: "/p/img.sif", env: ["1X=2"] })).toThrow(
      ValidationError,
    );
    expect(() => validateContainerOptions({ image: " ", env: [] })).toThrow(ValidationError);
    expect(() => validateContainerOptions({ image: "/p/img.sif", env: ["A_B=1=2"] })).not.toThrow();
  });
});

describe("scheduler output parsing", () => {
  it("parses standard sbatch output", () => {
    expect(parseSubmittedJobId("Submitted batch job 123456\n")).toBe("123456");
  });

  it("parses fallback output", () => {
    expect(parseSubmittedJobId("job 777777 accepted")).toBe("777777");
    expect(() => parseSubmittedJobId("")).toThrow(/Unable to parse job id/);
  });

  it("parses squeue state and node", () => {
    expect(parseJobState("RUNNING|iris-042\n")).toEqual({ state: "RUNNING", node: "iris-042" });
    expect(parseJobState("pending|\n")).toEqual({ state: "PENDING", node: "" });
    expect(parseJobState("\n")).toBeNull();
    expect(parseJobState("REQUEUE_HOLD|\n")).toEqual({ state: "REQUEUE_HOLD", node: "" });
    expect(() => parseJobState("|iris-042")).toThrow(/Missing job state/);
  });

  it("treats only finished states as terminal", () => {
    expect(isTerminalState("FAILED")).toBe(true);
    expect(isTerminalState("CANCELLED")).toBe(true);
    expect(isTerminalState("REQUEUED")).toBe(false);
    expect(isTerminalState("SUSPENDED")).toBe(false);
    expect(isTerminalState("RUNNING")).toBe(false);
  });
});
