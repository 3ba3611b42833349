import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  changedFiles,
  currentBranchOrCommit,
  GIT_LABEL,
  mergeBase,
  runGit,
} from "../src/lib/git";
import { ProcessExecutionError } from "../src/lib/errors";
import { runProgram } from "../src/lib/process";

vi.mock("../src/lib/process", () => ({
  runProgram: vi.fn(),
}));

const runProgramMock = vi.mocked(runProgram);

describe("git helpers", () => {
  beforeEach(() => {
    runProgramMock.mockReset();
  });

  describe("runGit", () => {
    it("runs git through the process runner with the git label", async () => {
      runProgramMock.mockResolvedValue("ok\n");
      await expect(
        runGit(["status"], { cwd: "/repo", scratchDir: "/scratch" }),
      ).resolves.toBe("ok\n");
      expect(runProgramMock).toHaveBeenCalledWith(GIT_LABEL, ["git", "status"], {
        showOutput: true,
        cwd: "/repo",
        scratchDir: "/scratch",
      });
    });
  });

  describe("currentBranchOrCommit", () => {
    it("returns the short branch name", async () => {
      runProgramMock.mockResolvedValueOnce("main\n");
      await expect(currentBranchOrCommit({ cwd: "/repo" })).resolves.toBe("main");
      expect(runProgramMock).toHaveBeenCalledTimes(1);
      expect(runProgramMock.mock.calls[0][1]).toEqual([
        "git",
        "symbolic-ref",
        "--short",
        "HEAD",
      ]);
    });

    it("falls back to the short hash on a detached HEAD", async () => {
      runProgramMock
        .mockRejectedValueOnce(
          new ProcessExecutionError(["git", "symbolic-ref", "--short", "HEAD"], 128),
        )
        .mockResolvedValueOnce("abc1234\n");
      await expect(currentBranchOrCommit()).resolves.toBe("abc1234");
      expect(runProgramMock.mock.calls[1][1]).toEqual([
        "git",
        "rev-parse",
        "--short",
        "HEAD",
      ]);
    });

    it("fails when both queries fail", async () => {
      runProgramMock.mockRejectedValue(new ProcessExecutionError(["git"], 128));
      await expect(currentBranchOrCommit()).rejects.toBeInstanceOf(
        ProcessExecutionError,
      );
    });

    it("does not hide unexpected errors", async () => {
      runProgramMock.mockRejectedValueOnce(new Error("spawn git ENOENT"));
      await expect(currentBranchOrCommit()).rejects.toThrow("spawn git ENOENT");
      expect(runProgramMock).toHaveBeenCalledTimes(1);
    });
  });

  describe("mergeBase", () => {
    it("returns the trimmed merge-base commit", async () => {
      runProgramMock.mockResolvedValue("0123456789abcdef\n");
      await expect(mergeBase({ cwd: "/repo" }, "feature", "master")).resolves.toBe(
        "0123456789abcdef",
      );
      expect(runProgramMock.mock.calls[0][1]).toEqual([
        "git",
        "merge-base",
        "feature",
        "master",
      ]);
    });

    it("propagates failures for invalid refs", async () => {
      runProgramMock.mockRejectedValue(
        new ProcessExecutionError(["git", "merge-base", "nope", "master"], 128),
      );
      await expect(mergeBase({}, "nope", "master")).rejects.toMatchObject({
        exitCode: 128,
      });
    });
  });

  describe("changedFiles", () => {
    it("returns name-only diff lines with output hidden", async () => {
      runProgramMock.mockResolvedValue("a/hwdef.dat\n\n  b/notes.txt \n");
      await expect(changedFiles({ cwd: "/repo" }, "base", "HEAD")).resolves.toEqual([
        "a/hwdef.dat",
        "b/notes.txt",
      ]);
      expect(runProgramMock).toHaveBeenCalledWith(
        GIT_LABEL,
        ["git", "diff", "--name-only", "base", "HEAD"],
        { showOutput: false, cwd: "/repo", scratchDir: undefined },
      );
    });

    it("returns an empty list for an empty diff", async () => {
      runProgramMock.mockResolvedValue("");
      await expect(changedFiles({}, "base", "HEAD")).resolves.toEqual([]);
    });
  });
});
