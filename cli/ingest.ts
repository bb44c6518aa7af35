#!/usr/bin/env tsx
/**
 * Exam Ingest CLI
 *
 * Usage:
 *   npx tsx cli/ingest.ts <command> [options]
 *   npm run ingest <command> [options]
 *
 * Commands:
 *   scan [dir]          Parse every new PDF in a directory
 *   parse <file>        Parse one PDF and print its report
 *   classify <text...>  Print the domain of a piece of text
 */

import { Command, InvalidArgumentError } from "commander";
import { config, EXTRACTION_BACKEND_PREFERENCES, type ExtractionBackendPreference } from "@/lib/config";
import { resolveExtractionAdapter } from "@/lib/extraction";
import { DomainClassifier } from "@/lib/ingest/domain-classifier";
import { JsonFileImportLedger } from "@/lib/ingest/import-ledger";
import { parseDocument, type IngestionContext } from "@/lib/ingest/parse-document";
import { ScanSession, type ScanSummary } from "@/lib/ingest/scan-session";
import { toReportSummary, type ParseReport } from "@/lib/ingest/types";
import { errorMessage, logSystem } from "@/lib/logger";
import { createExhibitStore } from "@/lib/storage";

const program = new Command();

// Colors for terminal output
const colors = {
  reset: "\x1b[0m",
  bright: "\x1b[1m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  red: "\x1b[31m",
};

function log(message: string, color = colors.reset) {
  console.log(`${color}${message}${colors.reset}`);
}

function success(message: string) {
  log(`✅ ${message}`, colors.green);
}

function error(message: string) {
  log(`❌ ${message}`, colors.red);
}

function info(message: string) {
  log(`ℹ️  ${message}`, colors.blue);
}

function warn(message: string) {
  log(`⚠️  ${message}`, colors.yellow);
}

function parseBackend(value: string): ExtractionBackendPreference {
  const match = EXTRACTION_BACKEND_PREFERENCES.find((b) => b === value);
  if (!match) {
    throw new InvalidArgumentError(`Unknown backend "${value}" (expected ${EXTRACTION_BACKEND_PREFERENCES.join(", ")})`);
  }
  return match;
}

async function createContext(): Promise<IngestionContext> {
  const { backend } = program.opts<{ backend?: ExtractionBackendPreference }>();
  return {
    adapter: await resolveExtractionAdapter(backend ?? config.extraction.backend),
    classifier: await DomainClassifier.fromFile(config.paths.domainsConfig),
    exhibitStore: createExhibitStore(),
  };
}

function printReport(report: ParseReport) {
  if (report.failed) {
    error(`${report.filename}: ${(report.pageIssues[0] ?? []).join("; ")}`);
    return;
  }
  log(`${colors.bright}${report.filename}${colors.reset} (${report.backend ?? "no backend"})`);
  log(`   ${report.validQuestions}/${report.totalQuestions} valid`);
  if (report.missingAnswers > 0) warn(`${report.missingAnswers} missing answers`);
  if (report.brokenChoices > 0) warn(`${report.brokenChoices} with fewer than 2 choices`);
  if (report.duplicates > 0) warn(`${report.duplicates} duplicates`);
  for (const warning of report.warnings) warn(warning);
}

function printScan(summary: ScanSummary) {
  if (summary.demo) {
    info(`No PDFs found. ${summary.totalQuestions} demo questions available.`);
    return;
  }
  info(`${summary.filesFound} PDFs found, ${summary.skippedFiles.length} already imported`);
  for (const doc of summary.documents) {
    const status = doc.failed ? `${colors.red}failed` : `${doc.validQuestions}/${doc.totalQuestions} valid`;
    log(`   ${doc.filename}: ${status}${colors.reset}`);
  }
  const { missingAnswers, brokenChoices, duplicates } = summary.issuesSummary;
  log(`   Issues: ${missingAnswers} missing answers, ${brokenChoices} broken choices, ${duplicates} duplicates`);
  if (summary.needsImport) {
    success(`${summary.validQuestions} of ${summary.totalQuestions} questions ready to import`);
  } else {
    success("Nothing new to import");
  }
}

// ============================================================================
// COMMANDS
// ============================================================================

program
  .command("scan")
  .description("Parse every PDF in a directory that has not been imported yet")
  .argument("[dir]", "Directory to scan", config.paths.documents)
  .option("--json", "Print the scan summary as JSON")
  .option("--record", "Record the scanned documents as imported")
  .option("--demo", "Offer demo questions when no PDFs are found")
  .action(async (dir: string, options: { json?: boolean; record?: boolean; demo?: boolean }) => {
    const session = new ScanSession({
      ingestion: await createContext(),
      ledger: new JsonFileImportLedger(config.paths.importLedger),
      demoWhenEmpty: Boolean(options.demo),
    });

    const summary = await session.scanDirectory(dir);
    if (options.json) {
      console.log(JSON.stringify(summary, null, 2));
    } else {
      printScan(summary);
    }

    if (options.record && summary.needsImport) {
      const plan = session.prepareImport();
      const recorded = await session.completeImport();
      success(`Recorded ${recorded.length} documents (${plan.questions.length} questions importable)`);
    }
  });

program
  .command("parse")
  .description("Parse one PDF and print its report")
  .argument("<file>", "PDF file")
  .option("--json", "Print the report as JSON")
  .option("--questions", "Include the parsed questions in the JSON report")
  .action(async (file: string, options: { json?: boolean; questions?: boolean }) => {
    const report = await parseDocument(file, await createContext());
    if (options.json) {
      console.log(JSON.stringify(options.questions ? report : toReportSummary(report), null, 2));
    } else {
      printReport(report);
    }
    if (report.failed) process.exitCode = 1;
  });

program
  .command("classify")
  .description("Print the domain a piece of text is classified into")
  .argument("<text...>", "Text to classify")
  .action(async (words: string[]) => {
    const classifier = await DomainClassifier.fromFile(config.paths.domainsConfig);
    const domainId = classifier.classify(words.join(" "));
    log(`${domainId}\t${classifier.getDomainName(domainId)}`);
  });

// ============================================================================
// MAIN
// ============================================================================

program
  .name("exam-ingest")
  .description("Exam document ingestion CLI")
  .version("0.1.0")
  .option("--backend <name>", "Extraction backend (auto, pdf-parse, pdfjs)", parseBackend);

program.parseAsync(process.argv).catch((e: unknown) => {
  logSystem("cli.failed", { level: "error", message: errorMessage(e) });
  process.exitCode = 1;
});
