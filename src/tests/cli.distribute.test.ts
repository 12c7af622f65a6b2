import { Command } from "commander";
import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  addGlobalOptions,
  registerDistributeCommands,
} from "../distribute-cli.js";

describe("fancopy CLI", () => {
  let tmp: string;
  let savedEnv: Record<string, string | undefined>;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  const buildProgram = () => {
    const program = new Command();
    program.exitOverride();
    addGlobalOptions(program);
    registerDistributeCommands(program);
    return program;
  };

  async function writeConfig(name: string, lines: string[]): Promise<string> {
    const file = path.join(tmp, name);
    await fsp.writeFile(file, lines.join("\n") + "\n");
    return file;
  }

  beforeAll(async () => {
    tmp = await fsp.mkdtemp(path.join(os.tmpdir(), "fancopy-cli-"));
    await fsp.mkdir(path.join(tmp, "set"));
    await fsp.writeFile(path.join(tmp, "set", "a.txt"), "a\n");
    await fsp.writeFile(path.join(tmp, "lines.txt"), "1\n2\n3\n4\n");
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  beforeEach(() => {
    savedEnv = {
      FANCOPY_LOCAL_NODES: process.env.FANCOPY_LOCAL_NODES,
      FANCOPY_DISABLE_LOG_ECHO: process.env.FANCOPY_DISABLE_LOG_ECHO,
    };
    delete process.env.FANCOPY_LOCAL_NODES;
    delete process.env.FANCOPY_DISABLE_LOG_ECHO;
    logSpy = jest.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    for (const [key, value] of Object.entries(savedEnv)) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    logSpy.mockRestore();
    errorSpy.mockRestore();
    process.exitCode = undefined;
  });

  test("takes one node per --local given before the command", async () => {
    const set = path.join(tmp, "set");
    const config = await writeConfig("broadcast.csv", [
      "direction,node,path",
      `source,here,${set}/`,
      "destination,n2,/data/",
      "destination,n3,/data/",
    ]);
    await buildProgram().parseAsync(
      ["node", "fancopy", "--local", "here", "plan", "broadcast", config, "--json"],
    );
    expect(process.exitCode).toBeUndefined();
    expect(logSpy).toHaveBeenCalledTimes(1);
    const from = { node: "here", path: `${set}/`, trailingSlash: true };
    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      mode: "broadcast",
      rounds: [
        {
          index: 0,
          edges: [
            {
              from,
              to: { node: "n2", path: "/data/", trailingSlash: true },
              selection: { kind: "entry" },
              append: false,
            },
          ],
        },
        {
          index: 1,
          edges: [
            {
              from,
              to: { node: "n3", path: "/data/", trailingSlash: true },
              selection: { kind: "entry" },
              append: false,
            },
          ],
        },
      ],
    });
  });

  test("collects comma-separated and repeated --local values", async () => {
    const config = await writeConfig("scatter-plan.csv", [
      "direction,node,path,from,to",
      `source,here,${path.join(tmp, "lines.txt")}`,
      "destination,n2,/p.txt,0,4",
    ]);
    const program = buildProgram();
    await program.parseAsync([
      "node",
      "fancopy",
      "--local",
      "a, b",
      "--local",
      "here",
      "plan",
      "scatter",
      config,
    ]);
    expect(program.opts().local).toEqual(["a", "b", "here"]);
    expect(process.exitCode).toBeUndefined();
  });

  test("compiles and logs a run without copying in dry-run mode", async () => {
    const config = await writeConfig("scatter.csv", [
      "direction,node,path,from,to",
      `source,here,${path.join(tmp, "lines.txt")}`,
      "destination,n2,/p.txt,0,2",
      "destination,n3,/p.txt,2,4",
    ]);
    await buildProgram().parseAsync(
      ["node", "fancopy", "--local", "here", "--dry-run", "scatter", config],
    );
    expect(process.exitCode).toBeUndefined();
    expect(errorSpy).toHaveBeenCalledWith(
      "ℹ️ scatter finished",
      '{"rounds":1,"transfers":2,"dryRun":true}',
    );
  });

  test("exits with status 1 when the config cannot be read", async () => {
    await buildProgram().parseAsync(
      ["node", "fancopy", "gather", path.join(tmp, "missing.csv")],
    );
    expect(process.exitCode).toBe(1);
  });
});
