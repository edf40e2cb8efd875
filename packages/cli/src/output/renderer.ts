import path from 'path';
import pc from 'picocolors';

const RULE = '-'.repeat(50);

export interface PackReport {
  status: 'packed' | 'empty';
  runId: string;
  rootPath: string;
  outputPath: string;
  fileCount: number;
  /** Aggregate size in characters */
  totalChars: number;
  files: string[];
  skipped: { path: string; reason: string }[];
  warnings: string[];
  prompt?: {
    path: string;
    status: string;
  };
  launch: {
    url: string;
    browser: boolean;
  };
}

export function formatMegabytes(chars: number): string {
  return (chars / 1024 / 1024).toFixed(2);
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  render(report: PackReport): void {
    if (this.isJson) {
      console.log(JSON.stringify(report, null, 2));
    } else if (report.status === 'empty') {
      console.log('No matching files found to pack.');
    } else {
      this.renderSuccess(report);
    }
  }

  private renderSuccess(report: PackReport): void {
    const filename = path.basename(report.outputPath);

    console.log(RULE);
    console.log(`${pc.green('SUCCESS!')} Context packed into: ${filename}`);
    console.log(` - Files included: ${report.fileCount}`);
    console.log(` - Approximate size: ${formatMegabytes(report.totalChars)} MB`);
    if (report.skipped.length > 0) {
      console.log(` - Skipped (unreadable): ${report.skipped.length}`);
    }
    console.log(RULE);
    if (report.prompt) {
      console.log(`${pc.bold('INSTRUCTION PROMPT:')} ${report.prompt.status}`);
      console.log(RULE);
    }
    console.log(pc.bold('STEPS:'));
    const { url, browser } = report.launch;
    console.log(
      browser
        ? `1. Opening ${pc.cyan(url)} in your browser...`
        : `1. Open ${pc.cyan(url)} in your browser.`,
    );
    console.log(`2. DRAG & DROP '${filename}' into the chat.`);
    console.log('3. PASTE (Ctrl+V) the instruction prompt.');
    console.log(RULE);
  }
}
