/**
 * Console logging for Stevedore runs.
 * Timestamped lines, ANSI colours and tree-style details.
 */

import type { ProjectReport, RunMode, RunReport } from "../types";

// ANSI colors & icons
const COLORS = {
  reset: "\x1b[0m",
  bright: "\x1b[1m",
  dim: "\x1b[90m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  white: "\x1b[97m",
  gray: "\x1b[37m",
} as const;

const ICONS = {
  success: "✓",
  failure: "✗",
  warning: "⚠",
};

type ColorName = keyof typeof COLORS;
type Details = Record<string, string | number | boolean>;

const ANSI_REGEX = /\x1b\[[0-9;]*m/g;

// Color helpers
const c = (color: ColorName, text: string): string =>
  COLORS[color] + text + COLORS.reset;

const cb = (color: ColorName, text: string): string =>
  COLORS.bright + COLORS[color] + text + COLORS.reset;

// Time & text helpers
function getTimestamp(): string {
  return new Date().toISOString().split("T")[1].split(".")[0];
}

function ts(): string {
  return c("dim", `[${getTimestamp()}]`);
}

function visibleLength(str: string): number {
  return str.replace(ANSI_REGEX, "").length;
}

function indent(): string {
  return " ".repeat(visibleLength(ts()) + 3);
}

/**
 * Wraps text to fit terminal width with proper continuation indentation.
 * @param firstLinePrefix - Prefix for the first line (including indent and label)
 * @param continuationIndent - Indent string for continuation lines
 */
function wrapText(
  text: string,
  firstLinePrefix: string,
  continuationIndent: string,
): string {
  const termWidth = process.stdout.columns || 120;
  const firstLineMax = termWidth - visibleLength(firstLinePrefix);
  const continuationMax = termWidth - visibleLength(continuationIndent);

  if (text.length <= firstLineMax) {
    return text;
  }

  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";
  let isFirstLine = true;

  for (const word of words) {
    const maxWidth = isFirstLine ? firstLineMax : continuationMax;
    const testLine = currentLine ? `${currentLine} ${word}` : word;

    if (testLine.length > maxWidth && currentLine) {
      lines.push(currentLine);
      currentLine = word;
      isFirstLine = false;
    } else {
      currentLine = testLine;
    }
  }

  if (currentLine) {
    lines.push(currentLine);
  }

  return lines
    .map((line, i) => (i === 0 ? line : `\n${continuationIndent}${line}`))
    .join("");
}

function clearLine(): void {
  process.stdout.write("\r");
  process.stdout.write(" ".repeat(process.stdout.columns || 120));
  process.stdout.write("\r");
}

// Dynamic ellipsis animation
let ellipsisTimer: NodeJS.Timeout | null = null;
let ellipsisActive = false;

const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";

function startEllipsis(message: string): void {
  if (ellipsisActive) return;
  ellipsisActive = true;

  process.stdout.write(HIDE_CURSOR);
  const frames = ["   ", ".  ", ".. ", "..."];
  let frame = 0;

  ellipsisTimer = setInterval(() => {
    const line = `${ts()} ${c("gray", message)}${frames[frame]}`;
    process.stdout.write(`\r${line}   `);
    frame = (frame + 1) % frames.length;
  }, 350);
  ellipsisTimer.unref();
}

function stopEllipsis(): void {
  if (!ellipsisActive) return;

  if (ellipsisTimer) {
    clearInterval(ellipsisTimer);
    ellipsisTimer = null;
  }

  ellipsisActive = false;
  clearLine();
  process.stdout.write(SHOW_CURSOR);
}

// Hierarchical logging
function logIndentedDetails(details: Details): void {
  const baseIndent = indent();

  const keys = Object.keys(details);
  keys.forEach((key, index) => {
    const isLast = index === keys.length - 1;
    const prefix = isLast ? "└─" : "├─";

    const labelPrefix = `${baseIndent}${prefix} ${key}: `;
    // Continuation indent aligns with content start (after "Key: ")
    const continuationIndent = " ".repeat(visibleLength(labelPrefix));

    const wrappedValue = wrapText(
      String(details[key]),
      labelPrefix,
      continuationIndent,
    );

    console.log(
      `${baseIndent}${c("gray", prefix)} ${c("white", key)}: ${c("gray", wrappedValue)}`,
    );
  });
}

function logProjectLine(project: ProjectReport, position: number): void {
  const pad = indent();
  const ok = project.status === "done";
  const icon = ok ? c("green", ICONS.success) : c("red", ICONS.failure);
  const outcome = ok ? c("dim", "done") : c("red", project.error?.kind ?? "failed");

  console.log(
    `${pad}  ${c("white", `${position}.`)} ${icon} ${c("white", project.projectId)} ${outcome}`,
  );
  console.log(`${pad}     ${c("dim", project.file)}`);

  if (project.error) {
    const messageIndent = `${pad}     `;
    console.log(
      `${messageIndent}${c("gray", wrapText(project.error.message, messageIndent, messageIndent))}`,
    );
  }
}

// Logger API
export const logger = {
  startup(mode: RunMode, details: Details): void {
    stopEllipsis();
    console.log(cb("white", "Stevedore"));
    console.log(c("white", mode === "tag" ? "Pinning compose images" : "Building and pushing compose projects"));
    console.log();
    logIndentedDetails(details);
  },

  stage(name: string): void {
    stopEllipsis();
    console.log();
    console.log(cb("white", name));
  },

  action(message: string): void {
    stopEllipsis();
    if (!process.stdout.isTTY) {
      console.log(`${ts()} ${c("gray", `${message}...`)}`);
      return;
    }
    startEllipsis(message);
  },

  result(success: boolean, message: string, details?: Details): void {
    stopEllipsis();
    const icon = success ? ICONS.success : ICONS.failure;
    const color: ColorName = success ? "green" : "red";

    console.log(`${ts()} ${c(color, icon)} ${c("white", message)}`);
    if (details) logIndentedDetails(details);
  },

  warn(message: string, details?: Details): void {
    stopEllipsis();
    console.log(`${ts()} ${c("yellow", ICONS.warning)} ${c("white", message)}`);
    if (details) logIndentedDetails(details);
  },

  info(message: string): void {
    stopEllipsis();
    console.log(`${ts()} ${c("gray", message)}`);
  },

  /** One line of streamed command output */
  output(line: string): void {
    stopEllipsis();
    console.log(`${indent()}${c("dim", line)}`);
  },

  report(report: RunReport): void {
    stopEllipsis();
    const failed = report.projects.filter((p) => p.status === "failed");

    console.log();
    if (report.ok) {
      console.log(`${ts()} ${c("green", ICONS.success)} ${cb("green", "All projects processed")}`);
    } else {
      console.log(`${ts()} ${c("red", ICONS.failure)} ${cb("red", "Run finished with failures")}`);
    }
    logIndentedDetails({
      Mode: report.mode,
      Root: report.root,
      Projects: report.projects.length,
      Failed: failed.length,
    });

    if (report.projects.length === 0) return;

    console.log(`\n${indent()}${c("gray", "Projects:")}`);
    report.projects.forEach((project, i) => logProjectLine(project, i + 1));
  },

  shutdown(): void {
    stopEllipsis();
    process.stdout.write(SHOW_CURSOR);
  },
};
