import { planScatter } from "../scatter.js";
import { ConfigError, ResolutionError } from "../errors.js";
import { h, StaticProbe } from "./util.js";

describe("planScatter", () => {
  const twoSources = [h("athena1", "/data/file.txt"), h("athena2", "/data/file.txt")];
  const fileProbe = () =>
    new StaticProbe({
      "athena1:/data/file.txt": { kind: "file", lines: 14 },
      "athena2:/data/file.txt": { kind: "file", lines: 14 },
    });

  test("assigns destinations to sources round-robin in a single round", async () => {
    const destinations = [
      h("athena3", "/data/part.txt", 0, 2),
      h("athena4", "/data/part.txt", 2, 4),
      h("athena5", "/data/part.txt", 4, 6),
      h("athena6", "/data/part.txt", 6, 8),
    ];
    const plan = await planScatter(twoSources, destinations, fileProbe());
    expect(plan.rounds).toHaveLength(1);
    const edges = plan.rounds[0].edges;
    expect(edges.map((e) => e.from.node)).toEqual([
      "athena1",
      "athena2",
      "athena1",
      "athena2",
    ]);
    expect(edges.map((e) => e.to.node)).toEqual([
      "athena3",
      "athena4",
      "athena5",
      "athena6",
    ]);
    expect(edges.map((e) => e.selection)).toEqual([
      { kind: "lines", range: { from: 0, to: 2 } },
      { kind: "lines", range: { from: 2, to: 4 } },
      { kind: "lines", range: { from: 4, to: 6 } },
      { kind: "lines", range: { from: 6, to: 8 } },
    ]);
    expect(edges.every((e) => !e.append)).toBe(true);
  });

  test("rejects a range beyond every source", async () => {
    await expect(
      planScatter(
        twoSources,
        [h("athena3", "/data/part.txt", 10, 20)],
        fileProbe(),
      ),
    ).rejects.toThrow("range [10,20) exceeds the available extent of 14");
  });

  test("rejects an empty range", async () => {
    await expect(
      planScatter(twoSources, [h("athena3", "/p", 3, 3)], fileProbe()),
    ).rejects.toThrow("empty range [3,3)");
  });

  test("rejects overlapping destination ranges", async () => {
    await expect(
      planScatter(
        twoSources,
        [h("athena3", "/p", 0, 5), h("athena4", "/p", 4, 8)],
        fileProbe(),
      ),
    ).rejects.toBeInstanceOf(ConfigError);
  });

  test("moves a destination to the next source that is long enough", async () => {
    const probe = new StaticProbe({
      "s1:/f": { kind: "file", lines: 10 },
      "s2:/f": { kind: "file", lines: 20 },
    });
    const plan = await planScatter(
      [h("s1", "/f"), h("s2", "/f")],
      [h("d1", "/p", 0, 5), h("d2", "/p", 5, 15), h("d3", "/p", 15, 20)],
      probe,
    );
    expect(plan.rounds[0].edges.map((e) => e.from.node)).toEqual([
      "s1",
      "s2",
      "s2",
    ]);
  });

  test("hands out slices of the sorted file listing of a folder", async () => {
    const probe = new StaticProbe({
      "athena1:/data/set/": {
        kind: "folder",
        entries: ["c.txt", "a.txt", "b/d.txt", "b/a.txt"],
      },
    });
    const plan = await planScatter(
      [h("athena1", "/data/set/")],
      [h("athena2", "/data/set/", 0, 2), h("athena3", "/data/set/", 2, 4)],
      probe,
    );
    expect(plan.rounds[0].edges.map((e) => e.selection)).toEqual([
      { kind: "files", files: ["a.txt", "b/a.txt"] },
      { kind: "files", files: ["b/d.txt", "c.txt"] },
    ]);
    expect(plan.rounds[0].edges.map((e) => e.from.node)).toEqual([
      "athena1",
      "athena1",
    ]);
  });

  test("copies a whole file when the destination has no range", async () => {
    const plan = await planScatter(
      [h("athena1", "/data/file.txt")],
      [h("athena2", "/data/copy.txt")],
      fileProbe(),
    );
    expect(plan.rounds[0].edges[0].selection).toEqual({ kind: "lines" });
  });

  test("refuses sources of different kinds", async () => {
    const probe = new StaticProbe({
      "s1:/x": { kind: "file", lines: 3 },
      "s2:/x": { kind: "folder", entries: ["a"] },
    });
    await expect(
      planScatter([h("s1", "/x"), h("s2", "/x")], [h("d", "/x", 0, 1)], probe),
    ).rejects.toBeInstanceOf(ResolutionError);
  });
});
