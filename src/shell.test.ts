import { describe, expect, it, vi } from "vitest";
import { ConnectionError, RemoteCommandError, UploadError } from "./errors.js";
import {
  ClusterAwareRemoteRunner,
  LocalRemoteRunner,
  SshRemoteRunner,
  detectClusterHost,
  scpTarget,
  scpUpload,
  shellJoin,
  shellQuote,
} from "./shell.js";
import type { CommandRunner } from "./types.js";

describe("shell quoting", () => {
  it("leaves plain words alone and single-quotes the rest", () => {
    expect(shellQuote("/scratch/users/jdoe")).toBe("/scratch/users/jdoe");
    expect(shellQuote("--output=%x-%j.out")).toBe("--output=%x-%j.out");
    expect(shellQuote("")).toBe("''");
    expect(shellQuote("a b")).toBe("'a b'");
    expect(shellQuote("it's")).toBe(`'it'"'"'s'`);
    expect(shellQuote("$HOME")).toBe("'$HOME'");
  });

  it("joins words into one command line", () => {
    expect(shellJoin(["echo", "hello world", "x"])).toBe("echo 'hello world' x");
  });

  it("builds scp targets with forward slashes", () => {
    expect(scpTarget("iris-cluster", "C:\\tmp\\img.tar")).toBe("iris-cluster:C:/tmp/img.tar");
  });
});

describe("ssh remote runner", () => {
  it("runs the command in batch mode and returns its output", async () => {
    const runner: CommandRunner = vi.fn(async () => ({ code: 0, stdout: "jdoe\n", stderr: "" }));
    const remote = new SshRemoteRunner({ runner });

    const result = await remote.execute("iris-cluster", "whoami");

    expect(result.stdout).toBe("jdoe\n");
    expect(runner).toHaveBeenCalledWith("ssh", ["-o", "BatchMode=yes", "iris-cluster", "whoami"], {
      stream: undefined,
    });
  });

  it("forwards the stream option", async () => {
    const runner: CommandRunner = vi.fn(async () => ({ code: 0, stdout: "", stderr: "" }));
    await new SshRemoteRunner({ runner }).execute("iris-cluster", "srun hostname", { stream: true });
    expect(runner).toHaveBeenCalledWith(
      "ssh",
      ["-o", "BatchMode=yes", "iris-cluster", "srun hostname"],
      { stream: true },
    );
  });

  it("maps exit code 255 to a connection error", async () => {
    const runner: CommandRunner = vi.fn(async () => ({
      code: 255,
      stdout: "",
      stderr: "ssh: Could not resolve hostname iris-cluster\n",
    }));

    const failure = new SshRemoteRunner({ runner }).execute("iris-cluster", "whoami");

    await expect(failure).rejects.toBeInstanceOf(ConnectionError);
    await expect(failure).rejects.toThrow(
      "Unable to reach iris-cluster: ssh: Could not resolve hostname iris-cluster",
    );
  });

  it("maps a missing ssh binary to a connection error", async () => {
    const runner: CommandRunner = vi.fn(async () => {
      throw new Error("spawn ssh ENOENT");
    });
    await expect(
      new SshRemoteRunner({ runner }).execute("iris-cluster", "whoami"),
    ).rejects.toBeInstanceOf(ConnectionError);
  });

  it("carries the remote exit code and diagnostics", async () => {
    const runner: CommandRunner = vi.fn(async () => ({
      code: 3,
      stdout: "",
      stderr: "srun: error: invalid partition\n",
    }));

    const error = await new SshRemoteRunner({ runner })
      .execute("iris-cluster", "srun -p nope hostname")
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteCommandError);
    if (!(error instanceof RemoteCommandError)) {
      return;
    }
    expect(error.exitCode).toBe(3);
    expect(error.command).toBe("srun -p nope hostname");
    expect(error.message).toBe("Remote command on iris-cluster failed: srun: error: invalid partition");
  });
});

describe("scp upload", () => {
  it("copies one file to the remote path", async () => {
    const runner: CommandRunner = vi.fn(async () => ({ code: 0, stdout: "", stderr: "" }));
    await scpUpload(runner, "iris-cluster", "/tmp/img.tar", "/scratch/u/img.tar");
    expect(runner).toHaveBeenCalledWith("scp", [
      "-o",
      "BatchMode=yes",
      "/tmp/img.tar",
      "iris-cluster:/scratch/u/img.tar",
    ]);
  });

  it("raises an upload error with scp's exit code", async () => {
    const runner: CommandRunner = vi.fn(async () => ({
      code: 1,
      stdout: "",
      stderr: "scp: /scratch/u/img.tar: Disk quota exceeded\n",
    }));

    const failure = scpUpload(runner, "iris-cluster", "/tmp/img.tar", "/scratch/u/img.tar");

    await expect(failure).rejects.toBeInstanceOf(UploadError);
    await expect(failure).rejects.toThrow(
      "Upload of /tmp/img.tar to iris-cluster:/scratch/u/img.tar failed: scp: /scratch/u/img.tar: Disk quota exceeded",
    );
  });
});

describe("local runner on the login node", () => {
  it("runs commands in a local shell", async () => {
    const runner: CommandRunner = vi.fn(async () => ({ code: 0, stdout: "jdoe\n", stderr: "" }));
    const local = new LocalRemoteRunner({ runner });

    const result = await local.execute("iris-cluster", "whoami", { stream: true });

    expect(result.stdout).toBe("jdoe\n");
    expect(await local.onCluster()).toBe(true);
    expect(runner).toHaveBeenCalledWith("bash", ["-c", "whoami"], { stream: true });
  });

  it("raises a remote command error on failure", async () => {
    const runner: CommandRunner = vi.fn(async () => ({ code: 4, stdout: "", stderr: "nope" }));

    const error = await new LocalRemoteRunner({ runner })
      .execute("iris-cluster", "test -f /p/img.sif")
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteCommandError);
    if (!(error instanceof RemoteCommandError)) {
      return;
    }
    expect(error.exitCode).toBe(4);
  });

  it("copies files with cp instead of scp", async () => {
    const runner: CommandRunner = vi.fn(async () => ({ code: 0, stdout: "", stderr: "" }));
    await new LocalRemoteRunner({ runner }).upload("iris-cluster", "/tmp/a.sh", "/scratch/u/a.sh");
    expect(runner).toHaveBeenCalledWith("cp", ["-fR", "/tmp/a.sh", "/scratch/u/a.sh"]);
  });

  it("raises an upload error when the copy fails", async () => {
    const runner: CommandRunner = vi.fn(async () => ({
      code: 1,
      stdout: "",
      stderr: "cp: cannot create regular file: Permission denied",
    }));

    await expect(
      new LocalRemoteRunner({ runner }).upload("iris-cluster", "/tmp/a.sh", "/scratch/u/a.sh"),
    ).rejects.toThrow(
      "Upload of /tmp/a.sh to /scratch/u/a.sh failed: cp: cannot create regular file: Permission denied",
    );
  });
});

describe("cluster detection", () => {
  it("matches the hostname against the marker", async () => {
    const onNode: CommandRunner = vi.fn(async () => ({ code: 0, stdout: "iris-001\n", stderr: "" }));
    const laptop: CommandRunner = vi.fn(async () => ({ code: 0, stdout: "laptop\n", stderr: "" }));
    const broken: CommandRunner = vi.fn(async () => ({ code: 1, stdout: "", stderr: "" }));

    expect(await detectClusterHost(onNode, "iris-")).toBe(true);
    expect(await detectClusterHost(laptop, "iris-")).toBe(false);
    expect(await detectClusterHost(broken, "iris-")).toBe(false);
    expect(onNode).toHaveBeenCalledWith("hostname", []);
  });

  it("runs commands locally on the cluster and checks the hostname once", async () => {
    const runner: CommandRunner = vi.fn(async (command) => ({
      code: 0,
      stdout: command === "hostname" ? "iris-001\n" : "ok\n",
      stderr: "",
    }));
    const remote = new ClusterAwareRemoteRunner({ runner, marker: "iris-" });

    await remote.execute("iris-cluster", "whoami");
    await remote.upload("iris-cluster", "/tmp/a.sh", "/scratch/u/a.sh");

    expect(vi.mocked(runner).mock.calls.map(([command]) => command)).toEqual([
      "hostname",
      "bash",
      "cp",
    ]);
  });

  it("goes through ssh and scp from a local machine", async () => {
    const runner: CommandRunner = vi.fn(async (command) => ({
      code: 0,
      stdout: command === "hostname" ? "laptop\n" : "",
      stderr: "",
    }));
    const remote = new ClusterAwareRemoteRunner({ runner, marker: "iris-" });

    await remote.execute("iris-cluster", "whoami");
    await remote.upload("iris-cluster", "/tmp/a.sh", "/scratch/u/a.sh");

    expect(await remote.onCluster()).toBe(false);
    expect(vi.mocked(runner).mock.calls.map(([command]) => command)).toEqual([
      "hostname",
      "ssh",
      "scp",
    ]);
  });
});
