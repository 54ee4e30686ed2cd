/**
 * Report command implementation
 *
 * Runs the technical and fundamental commands for one ticker and writes each
 * rendered section to its own file.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Command, CommandOptions, OutputFormat } from './types.js';
import {
  BaseResearchCommand,
  type BaseResearchCommandConfig,
  type CommandOutcome,
} from './base-research.command.js';
import { ResearchCommandError, ResearchErrorCode, wrapError } from './errors.js';

export const FILE_EXTENSIONS: Record<OutputFormat, string> = {
  text: 'txt',
  markdown: 'md',
  json: 'json',
};

export interface ReportCommandConfig extends BaseResearchCommandConfig {
  technical: Command;
  fundamental: Command;
  /** @default './reports' */
  outputDir?: string;
}

export interface ReportFailure {
  section: string;
  message: string;
}

export interface ReportArtifacts {
  ticker: string;
  files: string[];
  failures: ReportFailure[];
}

/**
 * `report <ticker>` - writes `{TICKER}-technical.{ext}` and
 * `{TICKER}-fundamental.{ext}` to the output directory.
 *
 * A section that fails is reported and skipped; the command fails only when
 * no section succeeds.
 */
export class ReportCommand extends BaseResearchCommand<ReportArtifacts> {
  readonly name = 'report';
  readonly description = 'Write technical and fundamental reports to the output directory';
  override readonly aliases = ['rep'];

  private readonly sections: Command[];
  private readonly outputDir: string;

  constructor(config: ReportCommandConfig) {
    super(config);
    this.sections = [config.technical, config.fundamental];
    this.outputDir = config.outputDir ?? './reports';
  }

  protected async executeCommand(
    ticker: string,
    options: CommandOptions
  ): Promise<CommandOutcome<ReportArtifacts>> {
    const format = options.format ?? 'text';
    const artifacts: ReportArtifacts = { ticker, files: [], failures: [] };
    let firstError: Error | undefined;

    await this.writeArtifact(() => mkdir(this.outputDir, { recursive: true }), this.outputDir);

    for (const section of this.sections) {
      const result = await section.execute([ticker], options);

      if (!result.success || result.output === null) {
        const error = result.error ?? new Error(`${section.name} produced no output`);
        firstError ??= error;
        artifacts.failures.push({ section: section.name, message: error.message });
        this.logger.warn('Report section failed', { ticker, section: section.name });
        continue;
      }

      const path = join(this.outputDir, `${ticker}-${section.name}.${FILE_EXTENSIONS[format]}`);
      const content = `${result.output}\n`;
      await this.writeArtifact(() => writeFile(path, content, 'utf-8'), path);
      artifacts.files.push(path);
      this.logger.debug('Wrote report section', { ticker, section: section.name, path });
    }

    if (artifacts.files.length === 0 && firstError) {
      throw firstError;
    }

    if (artifacts.files.length === 0) {
      throw new ResearchCommandError(ResearchErrorCode.MISSING_DATA, 'No report sections produced', {
        ticker,
      });
    }

    return {
      output: this.summarize(artifacts),
      data: artifacts,
      metadata: {
        files: artifacts.files.length,
        result: artifacts.failures.length > 0 ? 'partial' : 'success',
      },
    };
  }

  private async writeArtifact(write: () => Promise<unknown>, path: string): Promise<void> {
    try {
      await write();
    } catch (error) {
      throw wrapError(error, ResearchErrorCode.FORMAT_ERROR, { path });
    }
  }

  private summarize(artifacts: ReportArtifacts): string {
    const lines = [`Report for ${artifacts.ticker}:`];
    for (const file of artifacts.files) {
      lines.push(`  • Wrote ${file}`);
    }
    for (const failure of artifacts.failures) {
      lines.push(`  • Skipped ${failure.section}: ${failure.message}`);
    }
    return lines.join('\n');
  }
}
