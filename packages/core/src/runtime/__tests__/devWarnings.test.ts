import { assert, describe, test } from "@ply-ui/testkit";
import { createDevWarner } from "../devWarnings.js";

describe("createDevWarner", () => {
  test("warns once per area and key", () => {
    const lines: string[] = [];
    const warner = createDevWarner({ devMode: true, warn: (line) => lines.push(line) });

    warner.warnOnce("ui", "a", "first");
    warner.warnOnce("ui", "a", "repeated");
    warner.warnOnce("ui", "b", "second");
    warner.warnOnce("responsive", "a", "third");

    assert.deepEqual(lines, ["[ply-ui][ui] first", "[ply-ui][ui] second", "[ply-ui][responsive] third"]);
  });

  test("stays silent outside dev mode", () => {
    const lines: string[] = [];
    const warner = createDevWarner({ devMode: false, warn: (line) => lines.push(line) });

    warner.warnOnce("ui", "a", "ignored");
    assert.equal(warner.enabled, false);
    assert.deepEqual(lines, []);
  });
});
