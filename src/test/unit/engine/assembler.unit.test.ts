import { suite, test } from "mocha";
import * as assert from "assert";
import { assemble, buildTimeline, completionTimes } from "../../../engine/assembler";

suite("Result assembler", () => {
  const segments = [
    { processId: 1, start: 0, end: 2 },
    { processId: 2, start: 2, end: 4 },
    { processId: 1, start: 4, end: 6 },
    { processId: 2, start: 6, end: 7 },
  ];

  test("keeps one entry per segment, repeats included", () => {
    assert.deepStrictEqual(assemble(segments), {
      order: [1, 2, 1, 2],
      finish: [2, 4, 6, 7],
    });
  });

  test("completion time is the last occurrence of each process", () => {
    const completions = completionTimes(assemble(segments));
    assert.deepStrictEqual([...completions.entries()], [
      [1, 6],
      [2, 7],
    ]);
  });

  test("timeline fills idle gaps from time zero", () => {
    assert.deepStrictEqual(
      buildTimeline([
        { processId: 1, start: 2, end: 5 },
        { processId: 2, start: 10, end: 11 },
      ]),
      [
        { processId: null, start: 0, end: 2, idle: true },
        { processId: 1, start: 2, end: 5, idle: false },
        { processId: null, start: 5, end: 10, idle: true },
        { processId: 2, start: 10, end: 11, idle: false },
      ]
    );
  });

  test("timeline without gaps has no idle entries", () => {
    assert.strictEqual(buildTimeline(segments).filter((e) => e.idle).length, 0);
  });
});
