import { describe, it, expect, vi, afterEach } from "vitest";
import { CommanderError } from "commander";
import { createProgram, handleError } from "../cli.js";
import { authCommand } from "../commands/auth.js";
import { DEFAULT_CONFIG } from "../config.js";
import { AuthError, FlagError, ScopeError } from "../errors.js";
import { GitHubAPI } from "../github-api.js";
import type { TemplateDeps } from "../commands/template.js";

function quietProgram(deps: TemplateDeps) {
  const program = createProgram(deps);
  for (const command of [program, ...program.commands]) {
    command.configureOutput({ writeErr: () => {}, writeOut: () => {} });
  }
  return program;
}

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

describe("template command line", () => {
  it("parses the number and flags", async () => {
    const run = vi.fn().mockResolvedValue(undefined);
    const program = quietProgram({ config: DEFAULT_CONFIG, createClient: vi.fn(), run });

    await program.parseAsync(["template", "7", "--owner", "acme", "--undo", "--format", "json"], {
      from: "user",
    });

    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][0].opts).toEqual({
      owner: "acme",
      undo: true,
      number: 7,
      projectId: "",
      format: "json",
    });
  });

  it("fails on a non-numeric argument without creating a client", async () => {
    const createClient = vi.fn();
    const program = quietProgram({ config: DEFAULT_CONFIG, createClient, run: vi.fn() });

    await expect(program.parseAsync(["template", "abc"], { from: "user" })).rejects.toThrow(
      FlagError,
    );
    expect(createClient).not.toHaveBeenCalled();
  });

  it("rejects unknown output formats", async () => {
    const run = vi.fn();
    const program = quietProgram({ config: DEFAULT_CONFIG, createClient: vi.fn(), run });

    await expect(
      program.parseAsync(["template", "1", "--format", "yaml"], { from: "user" }),
    ).rejects.toMatchObject({ code: "commander.invalidArgument" });
    expect(run).not.toHaveBeenCalled();
  });

  it("rejects more than one positional argument", async () => {
    const run = vi.fn();
    const program = quietProgram({ config: DEFAULT_CONFIG, createClient: vi.fn(), run });

    await expect(
      program.parseAsync(["template", "1", "2"], { from: "user" }),
    ).rejects.toMatchObject({ code: "commander.excessArguments" });
    expect(run).not.toHaveBeenCalled();
  });
});

describe("usage errors", () => {
  it("are thrown to the caller with commander's exit code", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const run = vi.fn();
    const program = createProgram({ config: DEFAULT_CONFIG, createClient: vi.fn(), run });
    for (const command of program.commands) {
      command.configureOutput({ writeErr: () => {} });
    }

    const failure = await program
      .parseAsync(["template", "1", "--format", "yaml"], { from: "user" })
      .catch((err: unknown) => err);
    handleError(failure);

    expect(failure).toBeInstanceOf(CommanderError);
    expect(failure).toMatchObject({ code: "commander.invalidArgument", exitCode: 1 });
    expect(process.exitCode).toBe(1);
    expect(error).not.toHaveBeenCalled();
    expect(run).not.toHaveBeenCalled();
  });
});

describe("handleError", () => {
  it("prints flag errors with a usage hint", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    handleError(new FlagError("invalid number: abc"));

    expect(process.exitCode).toBe(1);
    expect(error).toHaveBeenCalledTimes(2);
    expect(error.mock.calls[0][1]).toBe("invalid number: abc");
  });

  it("prints the refresh command for scope errors", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    handleError(new ScopeError("missing scope", ["project"]));

    expect(process.exitCode).toBe(1);
    expect(String(error.mock.calls[2][0])).toContain("gh auth refresh -s project");
  });

  it("keeps commander's exit code", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    handleError(new CommanderError(2, "commander.unknownOption", "unknown option"));

    expect(process.exitCode).toBe(2);
    expect(error).not.toHaveBeenCalled();
  });
});

describe("authCommand", () => {
  it("reports the authenticated login", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const request = vi.fn().mockResolvedValue({ viewer: { id: "U_octocat", login: "octocat" } });
    const api = new GitHubAPI(request, { select: vi.fn() });

    await authCommand({ status: true }, async () => api);

    expect(String(log.mock.calls[0][0])).toContain("Authenticated as");
    expect(String(log.mock.calls[0][1])).toContain("octocat");
  });

  it("reports a missing token under --status", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    await authCommand({ status: true }, async () => {
      throw new AuthError("Not authenticated.");
    });

    expect(String(log.mock.calls[0][0])).toContain("Not authenticated");
  });

  it("propagates a missing token otherwise", async () => {
    await expect(
      authCommand({}, async () => {
        throw new AuthError("Not authenticated.");
      }),
    ).rejects.toBeInstanceOf(AuthError);
  });
});
