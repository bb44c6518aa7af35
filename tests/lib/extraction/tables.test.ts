import { describe, it, expect } from "vitest";
import { formatTableAsText, mergeTablesWithText } from "@/lib/extraction/tables";

describe("formatTableAsText", () => {
  it("renders a bordered table with a header separator", () => {
    expect(
      formatTableAsText([
        ["Name", "Role"],
        ["User1", "Owner"],
      ]),
    ).toBe(
      [
        "+-------+-------+",
        "| Name  | Role  |",
        "+-------+-------+",
        "| User1 | Owner |",
        "+-------+-------+",
      ].join("\n"),
    );
  });

  it("pads ragged rows and empty cells", () => {
    expect(formatTableAsText([["A", "B", "C"], ["1", null]])).toBe(
      ["+---+---+---+", "| A | B | C |", "+---+---+---+", "| 1 |   |   |", "+---+---+---+"].join("\n"),
    );
  });

  it("returns null when fewer than two rows have content", () => {
    expect(formatTableAsText([["Only"]])).toBeNull();
    expect(formatTableAsText([["", null], ["Value"]])).toBeNull();
  });
});

describe("mergeTablesWithText", () => {
  const table = "+---+\n| x |\n+---+";

  it("inserts after the sentence that introduces the table", () => {
    const text = "You have the following users:\nWhich user can sign in?";

    expect(mergeTablesWithText(text, [table])).toBe(
      `You have the following users:\n\n${table}\nWhich user can sign in?`,
    );
  });

  it("falls back to the end of the first paragraph", () => {
    expect(mergeTablesWithText("First paragraph.\n\nSecond.", [table])).toBe(
      `First paragraph.\n\n${table}\n\nSecond.`,
    );
  });

  it("appends when there is no paragraph break", () => {
    expect(mergeTablesWithText("Plain text", [table, table])).toBe(`Plain text\n\n${table}\n\n${table}`);
  });

  it("leaves text alone without tables", () => {
    expect(mergeTablesWithText("Plain text", [])).toBe("Plain text");
  });
});
