/**
 * Tests for extract-fields.ts
 *
 * Verifies:
 * - Question number, text, choices, answers and explanation of a block
 * - Answer strategies in order, de-duplicated letters
 * - Question type cues (multi, true/false)
 * - Study questions: boilerplate removal and explanation fallbacks
 */
import { describe, it, expect } from "vitest";
import {
  ANSWER_STRATEGIES,
  determineQuestionType,
  detectStudyKind,
  extractAnswers,
  extractChoices,
  extractExplanation,
  extractQuestionNumber,
  parseBlock,
} from "@/lib/ingest/extract-fields";
import { firstMatch } from "@/lib/ingest/strategies";

const block = [
  "Q3",
  "You have an Azure subscription that contains a storage account.",
  "What should you configure?",
  "A. A lifecycle management policy",
  "B. A resource lock on the account",
  "C. A shared access signature",
  "Answer: B",
  "Explanation:",
  "Resource locks prevent accidental deletion of the account.",
].join("\n");

describe("parseBlock", () => {
  it("extracts every field of a gradable question", () => {
    const q = parseBlock(block);

    expect(q).not.toBeNull();
    expect(q?.sourcePage).toBe(3);
    expect(q?.text).toBe(
      "You have an Azure subscription that contains a storage account.\n\nWhat should you configure?",
    );
    expect(q?.choices).toEqual([
      { label: "A", text: "A lifecycle management policy" },
      { label: "B", text: "A resource lock on the account" },
      { label: "C", text: "A shared access signature" },
    ]);
    expect(q?.correctAnswers).toEqual(["B"]);
    expect(q?.explanation).toBe("Resource locks prevent accidental deletion of the account.");
    expect(q?.questionType).toBe("single");
  });

  it("takes the explanation from after the choices of a series question", () => {
    const seriesBlock = [
      "Q4",
      "Note: This question is part of a series of questions that present the same scenario.",
      "You have an Azure subscription named Sub1.",
      "You need to let a user manage virtual machines only.",
      "Solution: You assign the Owner role to the user.",
      "Does that meet the goal?",
      "A. Yes",
      "B. No",
      "Answer: B",
      "Explanation:",
      "Owner is too broad for the requirement.",
    ].join("\n");

    const q = parseBlock(seriesBlock);

    expect(q?.explanation).toBe("Owner is too broad for the requirement.");
    expect(q?.choices).toEqual([
      { label: "A", text: "Yes" },
      { label: "B", text: "No" },
    ]);
    expect(q?.correctAnswers).toEqual(["B"]);
    expect(q?.questionType).toBe("truefalse");
  });

  it("returns null when the block has no question text", () => {
    expect(parseBlock("Q1\nA. only choice")).toBeNull();
  });

  it("keeps a hotspot body and its explanation", () => {
    const hotspot = [
      "Q7",
      "HOTSPOT",
      "You need to configure the network settings shown in the answer area.",
      "Hot Area:",
      "Answer:",
      "Explanation:",
      "Box 1: Use a network security group to filter the inbound traffic on the subnet.",
    ].join("\n");

    const q = parseBlock(hotspot);

    expect(q?.questionType).toBe("study");
    expect(q?.text).toBe("You need to configure the network settings shown in the answer area.");
    expect(q?.explanation).toBe(
      "Box 1: Use a network security group to filter the inbound traffic on the subnet.",
    );
    expect(q?.choices).toEqual([]);
    expect(q?.correctAnswers).toEqual([]);
  });

  it("falls back to the reference link when a study explanation is too short", () => {
    const dragDrop = [
      "Q8",
      "DRAG DROP",
      "You need to move data between storage accounts.",
      "Select and Place:",
      "Answer:",
      "Explanation:",
      "Use AzCopy.",
      "Reference:",
      "https://example.com/a",
    ].join("\n");

    const q = parseBlock(dragDrop);

    expect(q?.text).toBe("You need to move data between storage accounts.");
    expect(q?.explanation).toBe("Reference: https://example.com/a");
  });

  it("uses a placeholder when a study question has nothing else", () => {
    const q = parseBlock("Q9\nHOTSPOT\nYou need to configure access for the users.\nHot Area:");

    expect(q?.questionType).toBe("study");
    expect(q?.explanation).toMatch(/^HOTSPOT: /);
  });
});

describe("extractQuestionNumber", () => {
  it("reads Q, QUESTION and numbered headers", () => {
    expect(extractQuestionNumber("Q12\nText")).toBe(12);
    expect(extractQuestionNumber("QUESTION NO: 45\nText")).toBe(45);
    expect(extractQuestionNumber("7) Text")).toBe(7);
    expect(extractQuestionNumber("Text only")).toBe(0);
  });
});

describe("extractChoices", () => {
  it("keeps the first hit of a label and stops the last choice at the answer line", () => {
    const choices = extractChoices("Q1\nPick one.\nA. First option text\nB. Second option text\nAnswer: A. First");

    expect(choices).toEqual([
      { label: "A", text: "First option text" },
      { label: "B", text: "Second option text" },
    ]);
  });

  it("ignores a label-like token in the question body", () => {
    const choices = extractChoices(
      [
        "Q5",
        "You have a virtual machine in Subnet A. Which resource should you create?",
        "A. A network security group",
        "B. A route table",
        "Answer: A",
      ].join("\n"),
    );

    expect(choices).toEqual([
      { label: "A", text: "A network security group" },
      { label: "B", text: "A route table" },
    ]);
  });

  it("accepts parenthesis labels", () => {
    expect(extractChoices("Pick one\nA) Red color\nB) Blue color")).toEqual([
      { label: "A", text: "Red color" },
      { label: "B", text: "Blue color" },
    ]);
  });
});

describe("extractAnswers", () => {
  it("reads the answer line", () => {
    expect(extractAnswers("Which?\nA. x\nB. y\nAnswer: B\nExplanation: because")).toEqual(["B"]);
  });

  it("reads several letters and removes repeats in order", () => {
    expect(extractAnswers("Correct Answer: A, C\nSection")).toEqual(["A", "C"]);
    expect(extractAnswers("Answer: AC")).toEqual(["A", "C"]);
    expect(extractAnswers("Answer: B, B, A")).toEqual(["B", "A"]);
  });

  it("falls through to later strategies", () => {
    expect(firstMatch(ANSWER_STRATEGIES, "Answer: B is the best")).toEqual({
      strategy: "answer-letter",
      value: ["B"],
    });
    expect(firstMatch(ANSWER_STRATEGIES, "**Answer**: D")).toEqual({
      strategy: "markdown-answer",
      value: ["D"],
    });
  });

  it("returns no answers when nothing matches", () => {
    expect(extractAnswers("What is this?")).toEqual([]);
  });
});

describe("determineQuestionType", () => {
  it("detects multi-select cues", () => {
    expect(determineQuestionType("Which two actions should you perform? (Choose two)", [])).toBe("multi");
  });

  it("detects true/false and yes/no pairs", () => {
    const tf = [
      { label: "A" as const, text: "True" },
      { label: "B" as const, text: "False" },
    ];
    const yn = [
      { label: "A" as const, text: "Yes" },
      { label: "B" as const, text: " no " },
    ];
    expect(determineQuestionType("Is it?", tf)).toBe("truefalse");
    expect(determineQuestionType("Does it?", yn)).toBe("truefalse");
  });

  it("defaults to single", () => {
    expect(determineQuestionType("Pick one", [{ label: "A", text: "Yes" }])).toBe("single");
  });
});

describe("extractExplanation", () => {
  it("drops explanations shorter than 20 characters", () => {
    expect(extractExplanation("Explanation: too short")).toBeNull();
  });

  it("keeps an explanation of exactly 20 characters", () => {
    expect(extractExplanation("Explanation: 12345678901234567890")).toBe("12345678901234567890");
  });

  it("prefers an Explanation section over an earlier Reference", () => {
    const text = [
      "Answer: A",
      "Reference: https://example.com/docs/locks",
      "Explanation: The lock blocks deletion of the account.",
    ].join("\n");

    expect(extractExplanation(text)).toBe("The lock blocks deletion of the account.");
  });

  it("ignores a Note in the question body", () => {
    const text = [
      "Note: This question is part of a series of questions.",
      "Does that meet the goal?",
      "A. Yes",
      "B. No",
      "Answer: A",
    ].join("\n");

    expect(extractExplanation(text)).toBeNull();
  });

  it("caps long explanations", () => {
    expect(extractExplanation(`Explanation: ${"x".repeat(2500)}`)).toHaveLength(2000);
  });
});

describe("detectStudyKind", () => {
  it("recognizes drag-and-drop and hotspot markers", () => {
    expect(detectStudyKind("DRAGDROP\nText")).toBe("drag-drop");
    expect(detectStudyKind("hotspot\nText")).toBe("hotspot");
    expect(detectStudyKind("Plain")).toBeNull();
  });
});
