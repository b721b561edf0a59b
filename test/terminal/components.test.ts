import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  box,
  header,
  progressBar,
  separator,
  table,
} from "../../source/terminal/components.ts";
import { visibleLength } from "../../source/terminal/strip-ansi.ts";

describe("box", () => {
  it("should center the text between the borders", () => {
    assert.strictEqual(box("Hi", 6), "┌──────┐\n│  Hi  │\n└──────┘");
  });

  it("should give the odd remainder to the right padding", () => {
    assert.strictEqual(box("Hey", 6).split("\n")[1], "│ Hey  │");
  });

  it("should keep every line the same visible width", () => {
    const lines = box("\u001B[36mcolored\u001B[39m", 20).split("\n");
    assert.deepStrictEqual(
      lines.map((line) => visibleLength(line)),
      [22, 22, 22],
    );
  });

  it("should use 77 columns by default", () => {
    assert.strictEqual(box("x").split("\n")[0], `┌${"─".repeat(77)}┐`);
  });
});

describe("header", () => {
  it("should surround the box with blank lines", () => {
    assert.strictEqual(header("Hi", 6), "\n┌──────┐\n│  Hi  │\n└──────┘\n");
  });

  it("should paint the title", () => {
    const lines = header("Hi", 6, (text) => `<${text}>`).split("\n");
    assert.strictEqual(lines[2], "│ <Hi> │");
  });
});

describe("separator", () => {
  it("should repeat the character", () => {
    assert.strictEqual(separator("=", 5), "=====");
  });

  it("should default to a 79-column box-drawing rule", () => {
    assert.strictEqual(separator(), "─".repeat(79));
  });
});

describe("table", () => {
  it("should size columns to their widest cell and rule the header", () => {
    assert.strictEqual(
      table(["Name|Age", "Alice|30", "Bob|25"]),
      [
        "│ Name  │ Age │",
        "├───────┼─────┤",
        "│ Alice │ 30  │",
        "│ Bob   │ 25  │",
      ].join("\n"),
    );
  });

  it("should measure colored cells by their visible width", () => {
    const rendered = table(["Status|Count", "\u001B[32mok\u001B[39m|7"]).split("\n");
    assert.strictEqual(rendered[0], "│ Status │ Count │");
    assert.strictEqual(rendered[2], "│ \u001B[32mok\u001B[39m     │ 7     │");
  });

  it("should pad rows with fewer cells", () => {
    assert.strictEqual(table(["A|B|C", "x"]).split("\n")[2], "│ x │   │   │");
  });

  it("should render nothing for no rows", () => {
    assert.strictEqual(table([]), "");
  });
});

describe("progressBar", () => {
  it("should draw a partial bar with an arrow at the leading edge", () => {
    assert.strictEqual(
      progressBar(3, 4, "Copying"),
      `\rCopying: [${"=".repeat(30)}>${" ".repeat(9)}]  75%`,
    );
  });

  it("should end with a newline once complete", () => {
    assert.strictEqual(
      progressBar(4, 4),
      `\rProgress: [${"=".repeat(40)}] 100%\n`,
    );
  });

  it("should draw an empty bar at zero", () => {
    assert.strictEqual(
      progressBar(0, 10, "Step", 10),
      `\rStep: [>${" ".repeat(9)}]   0%`,
    );
  });

  it("should clamp values outside the range", () => {
    assert.strictEqual(progressBar(12, 10, "Step", 10), `\rStep: [${"=".repeat(10)}] 100%\n`);
    assert.strictEqual(progressBar(-3, 10, "Step", 10), `\rStep: [>${" ".repeat(9)}]   0%`);
  });

  it("should treat a zero total as complete", () => {
    assert.strictEqual(progressBar(0, 0, "Step", 4), "\rStep: [====] 100%\n");
  });
});
