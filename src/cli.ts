#!/usr/bin/env node

/**
 * Command-line entry point: import, validate, export and compile
 */

import * as fs from 'fs';
import * as path from 'path';
import { getConfig, displayConfig } from './config';
import { AppConfig, FolderKind, Project, WarningSeverity } from './types';
import { ScrivenerImporter } from './scrivener/importer';
import { ScrivenerExporter } from './scrivener/exporter';
import { TextDocumentImporter } from './import/textDocumentImporter';
import { CompileService } from './compile/compileService';
import { exportFormatSchema, parseCompileSettings } from './compile/settings';
import { parseProject } from './project/projectSchema';
import { DEFAULT_LABELS, DEFAULT_STATUSES, createFolder, emptyTargets } from './project/defaults';
import { slugify } from './util/slug';

const TEXT_FILE = /\.(md|markdown|txt|rtf)$/i;

function printUsage(): void {
  console.log('Usage:');
  console.log('  binder-interchange import <bundle.scriv|file.md> [out.json]  - Import into a project JSON file');
  console.log('  binder-interchange validate <bundle.scriv>                   - Check a Scrivener bundle');
  console.log('  binder-interchange export <project.json> [destDir]           - Write a .scriv bundle');
  console.log('  binder-interchange compile <project.json> <format> [settings.json]');
  console.log(`      formats: ${exportFormatSchema.options.join(', ')}`);
}

function progressPrinter(config: AppConfig): ((fraction: number, message: string) => void) | undefined {
  if (!config.verbose) return undefined;
  return (fraction, message) => console.log(`  [${Math.round(fraction * 100)}%] ${message}`);
}

function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

function writeJson(filePath: string, value: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(value, null, 2) + '\n', 'utf-8');
}

async function importCommand(config: AppConfig, source: string, output?: string): Promise<void> {
  let project: Project;

  if (TEXT_FILE.test(source)) {
    const importer = new TextDocumentImporter({ logger: console });
    const validation = await importer.validate(source);
    validation.warnings.forEach(warning => console.warn(`⚠ ${warning}`));
    if (!validation.isValid) {
      throw new Error(validation.errors.join('; '));
    }

    const result = await importer.importDocument(source, {}, progressPrinter(config));
    const now = new Date();
    const draft = createFolder('Draft', FolderKind.DRAFT, now);
    draft.documents.push(result.document);
    project = {
      title: result.title,
      author: config.defaultAuthor,
      creationDate: now,
      modifiedDate: now,
      rootFolder: draft,
      labels: DEFAULT_LABELS.map(label => ({ ...label })),
      statuses: DEFAULT_STATUSES.map(status => ({ ...status })),
      targets: emptyTargets(),
      writingHistory: [],
    };
    result.warnings.forEach(warning => console.warn(`⚠ ${warning.message}`));
  } else {
    const importer = new ScrivenerImporter({
      logger: console,
      largeProjectThreshold: config.largeProjectThreshold,
    });
    const result = await importer.importProject(source, {}, progressPrinter(config));
    project = result.project;
    if (!project.author) project.author = config.defaultAuthor;

    for (const warning of result.warnings) {
      const prefix = warning.severity === WarningSeverity.INFO ? 'ℹ' : '⚠';
      const item = warning.itemTitle ? ` [${warning.itemTitle}]` : '';
      console.warn(`${prefix}${item} ${warning.message}`);
    }
  }

  const target = output ?? path.join(config.exportDir, `${slugify(project.title)}.json`);
  writeJson(target, project);
  console.log(`✓ Project written to ${target}`);
}

async function validateCommand(config: AppConfig, source: string): Promise<void> {
  const importer = new ScrivenerImporter({ largeProjectThreshold: config.largeProjectThreshold });
  const report = await importer.validateProject(source);

  console.log(`\nProject: ${report.projectTitle || '(unknown)'}`);
  console.log(`  Format: ${report.version}`);
  console.log(`  Items: ${report.itemCount}`);
  report.warnings.forEach(warning => console.warn(`  ⚠ ${warning}`));
  report.errors.forEach(error => console.error(`  ✗ ${error}`));

  if (!report.isValid) {
    process.exit(1);
  }
  console.log('✓ Bundle looks importable');
}

async function exportCommand(config: AppConfig, source: string, destDir?: string): Promise<void> {
  const project = parseProject(readJson(source));
  const exporter = new ScrivenerExporter({ logger: console });
  const bundle = await exporter.export(project, destDir ?? config.exportDir, progressPrinter(config));
  console.log(`✓ Bundle written to ${bundle}`);
}

async function compileCommand(
  config: AppConfig,
  source: string,
  format: string | undefined,
  settingsPath?: string
): Promise<void> {
  if (!format) {
    throw new Error(`Missing format (${exportFormatSchema.options.join(', ')})`);
  }
  const project = parseProject(readJson(source));
  const overrides = settingsPath ? readJson(settingsPath) : {};
  const settings = parseCompileSettings({
    ...(typeof overrides === 'object' && overrides !== null ? overrides : {}),
    format,
  });
  if (!settings.authorOverride && !project.author && config.defaultAuthor) {
    settings.authorOverride = config.defaultAuthor;
  }

  const service = new CompileService({ logger: config.verbose ? console : undefined });
  const stats = service.calculateStatistics(service.collectCompilableDocuments(project.rootFolder));
  console.log(`Compiling ${stats.documentCount} document(s), ${stats.wordCount} words (~${stats.estimatedPages} pages)`);

  const result = await service.compile(project, settings);
  const target = path.join(config.exportDir, result.filename);
  fs.mkdirSync(config.exportDir, { recursive: true });
  fs.writeFileSync(target, result.data);
  console.log(`✓ ${target}`);
}

async function main() {
  const [command, first, second, third] = process.argv.slice(2);

  const commands = ['import', 'validate', 'export', 'compile'];
  if (!command || !commands.includes(command) || !first) {
    printUsage();
    process.exit(1);
  }

  try {
    const config = getConfig();
    if (config.verbose) displayConfig(config);

    switch (command) {
      case 'import':
        await importCommand(config, first, second);
        break;
      case 'validate':
        await validateCommand(config, first);
        break;
      case 'export':
        await exportCommand(config, first, second);
        break;
      case 'compile':
        await compileCommand(config, first, second, third);
        break;
    }
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

main().catch(error => {
  console.error('Fatal error:', error);
  process.exit(1);
});
