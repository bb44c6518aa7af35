/**
 * Text Reconstruction
 *
 * PDF text comes out with words run together ("Youhave an Azuresubscription")
 * or split across lines. These helpers put the spacing back and keep the
 * paragraph structure of question bodies.
 */

// ------------------------------------------------------------------
// Constants
// ------------------------------------------------------------------

/** Shorthand used by exam dumps, expanded on word boundaries */
const ABBREVIATIONS: Array<[RegExp, string]> = [
  [/\bqis\b/gi, "question is"],
  [/\bqin\b/gi, "question in"],
  [/\bqs\b/gi, "questions"],
  [/\bqsets\b/gi, "question sets"],
  [/\bqset\b/gi, "question set"],
];

/** Known concatenation artifacts and their repaired form */
const CONCATENATIONS: Array<[string, string]> = [
  ["Youhave", "You have"],
  ["Youneed", "You need"],
  ["Youare", "You are"],
  ["Youplan", "You plan"],
  ["Youwant", "You want"],
  ["Whatshould", "What should"],
  ["Whichof", "Which of"],
  ["tothe", "to the"],
  ["ofthe", "of the"],
  ["inthe", "in the"],
  ["onthe", "on the"],
  ["fromthe", "from the"],
  ["allthe", "all the"],
  ["thatthe", "that the"],
  ["isthe", "is the"],
  ["forthe", "for the"],
  ["andthe", "and the"],
  ["thata", "that a"],
  ["tocreate", "to create"],
  ["toensure", "to ensure"],
  ["tomake", "to make"],
  ["toreference", "to reference"],
  ["todeploy", "to deploy"],
  ["toachieve", "to achieve"],
  ["shouldyou", "should you"],
  ["doyou", "do you"],
  ["canyou", "can you"],
];

const CONCATENATION_PATTERNS: Array<[RegExp, string]> = CONCATENATIONS.map(
  ([joined, spaced]) => [new RegExp(joined, "gi"), spaced],
);

/** Lines starting with these open a new paragraph */
const PARAGRAPH_START =
  /^(Note:|Solution:|After you|You |Your |From |To answer|Each |Some |Does |What |Which |How )/i;

// ------------------------------------------------------------------
// Normalization
// ------------------------------------------------------------------

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Repair spacing in a single run of text. Newlines are collapsed.
 */
export function fixWordSpacing(text: string): string {
  if (!text) return text;

  let fixed = text
    .replace(/([a-z])([A-Z])/g, "$1 $2")
    .replace(/([.!?,:;])([A-Za-z])/g, "$1 $2")
    .replace(/([a-zA-Z])\(/g, "$1 (")
    .replace(/\)([a-zA-Z])/g, ") $1");

  for (const [pattern, replacement] of ABBREVIATIONS) {
    fixed = fixed.replace(pattern, replacement);
  }
  for (const [pattern, replacement] of CONCATENATION_PATTERNS) {
    fixed = fixed.replace(pattern, replacement);
  }

  return collapseWhitespace(fixed);
}

/**
 * Repair spacing paragraph by paragraph. Blank lines and section-opening
 * sentences ("You have…", "Solution:", …) start paragraphs; paragraphs are
 * joined with a blank line.
 */
export function fixWordSpacingPreserveParagraphs(text: string): string {
  if (!text) return text;

  const paragraphs: string[] = [];
  let current: string[] = [];

  const flush = () => {
    if (current.length > 0) {
      paragraphs.push(fixWordSpacing(current.join(" ")));
      current = [];
    }
  };

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    if (!line) {
      flush();
      continue;
    }
    if (PARAGRAPH_START.test(line) && current.length > 0) {
      flush();
    }
    current.push(line);
  }
  flush();

  return paragraphs.join("\n\n");
}
