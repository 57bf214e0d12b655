/**
 * Consolidated type definitions and Zod schemas
 */

import { z } from "zod";
import { Tracker } from "./utils/tracker";
import { Logger } from "./utils/logger";

// Re-export classes
export { Tracker, Logger };

// ============================================================================
// Configuration Types & Schemas
// ============================================================================

export const CleanupOptionSchema = z.enum([
  "remove-headers",
  "small-titles",
  "remove-emails",
  "codify-paths",
  "remove-whitespace",
]);

export const RepositoryDescriptorSchema = z.object({
  sitesection: z.string().min(1),
  targets: z.array(z.string().min(1)).min(1),
  subdir: z.string().nullable(),
});

export const SourcesConfigSchema = z.object({
  patterns: z.array(z.string()).min(1),
  ignore: z.array(z.string()),
});

export const CommandsConfigSchema = z.object({
  build: z.string().min(1),
  buildArgs: z.array(z.string()),
  markdown: z.string().min(1),
});

export const SiteConfigSchema = z.object({
  name: z.string(),
  docsDir: z.string().min(1),
  navFile: z.string().min(1),
  navTemplate: z.string().nullable(),
});

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

export const RepositoryMapSchema = z.record(
  z.string(),
  RepositoryDescriptorSchema,
);

export const BuildConfigSchema = z.object({
  input: z.string(),
  output: z.string(),
  compile: z.boolean(),
  cleanup: z.array(CleanupOptionSchema),
  sources: SourcesConfigSchema,
  commands: CommandsConfigSchema,
  site: SiteConfigSchema,
  repositories: RepositoryMapSchema,
  logging: LoggingConfigSchema,
});

export const PartialBuildConfigSchema = BuildConfigSchema.partial().extend({
  sources: SourcesConfigSchema.partial().optional(),
  commands: CommandsConfigSchema.partial().optional(),
  site: SiteConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

export type CleanupOption = z.infer<typeof CleanupOptionSchema>;
export type RepositoryDescriptor = z.infer<typeof RepositoryDescriptorSchema>;
export type RepositoryMap = z.infer<typeof RepositoryMapSchema>;
export type SourcesConfig = z.infer<typeof SourcesConfigSchema>;
export type CommandsConfig = z.infer<typeof CommandsConfigSchema>;
export type SiteConfig = z.infer<typeof SiteConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type BuildConfig = z.infer<typeof BuildConfigSchema>;
export type PartialBuildConfig = z.infer<typeof PartialBuildConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}

// ============================================================================
// Site Types
// ============================================================================

/**
 * Generated markdown per repository, keyed by raw source path
 * Example: { "CCM": { "/src/CCM/target/doc/pod/EDG/WP4/CCM/Fetch.pod": "# Fetch" } }
 */
export type PageCatalog = Map<string, Map<string, string>>;

/**
 * Website pages per section, keyed by canonical page name
 * Example: { "CCM": { "Fetch.md": "# Fetch" } }
 * Map insertion order is the iteration order every stage relies on.
 */
export type SitePages = Map<string, Map<string, string>>;

/**
 * Section -> page names, sorted ignoring case and deduplicated
 */
export type TableOfContents = Map<string, string[]>;

/**
 * Reference patterns derived from one page, used while interlinking
 */
export interface LinkRule {
  section: string;
  pageName: string;
  basename: string;
  link: string; // e.g. "../components/fmonagent.md"
  patterns: string[]; // Regex sources, already escaped
}

/**
 * One line of markdown, flagged when it belongs to a fenced or indented code block
 */
export interface MarkdownLine {
  text: string;
  code: boolean;
}

export interface UnmatchedPage {
  repository: string;
  sourcePath: string;
  targets: string[];
}

// ============================================================================
// Collaborators
// ============================================================================

/** Whether an executable is reachable through the search path */
export type CommandAvailable = (command: string) => Promise<boolean>;

/** Lists the convertible source files of one repository */
export type SourceScanner = (
  repositoryPath: string,
  compile: boolean,
) => Promise<string[]>;

/** Converts one source file into markdown */
export type MarkdownGenerator = (sourcePath: string) => Promise<string>;

/** Runs the external repository build in the given directory */
export type BuildRunner = (repositoryPath: string) => Promise<void>;

export interface BuildCollaborators {
  commandAvailable: CommandAvailable;
  scanSources: SourceScanner;
  generateMarkdown: MarkdownGenerator;
}

// ============================================================================
// Preflight Types
// ============================================================================

export interface PreflightCheck {
  name: string;
  ok: boolean;
  message: string;
}

// ============================================================================
// Tracker Types
// ============================================================================

export type FileIssueReason = "read-error" | "convert-error";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export interface TargetIssue {
  type: "target";
  path: string;
  repository: string;
  targets: string[];
}

export interface RepositoryIssue {
  type: "repository";
  path: string;
  repository: string;
}

export type Issue = FileIssue | ResourceIssue | TargetIssue | RepositoryIssue;
export type IssueType = Issue["type"];

export interface BuildStats {
  repositories: number;
  sources: number;
  pages: number;
  unmatchedPages: number;
  links: number;
  sections: number;
  writtenPages: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Template Context Types
// ============================================================================

/**
 * Context passed to the navigation template
 * Available variables in mkdocs.yml.hbs
 */
export interface NavigationTemplateContext {
  siteName: string;
  docsDir: string;
  sections: Array<{
    name: string;
    pages: Array<{
      title: string; // Page name without extension, e.g. "Fetch::Download"
      filename: string; // e.g. "Fetch::Download.md"
      path: string; // e.g. "CCM/Fetch::Download.md"
    }>;
  }>;
}

// ============================================================================
// Build Context
// ============================================================================

/**
 * Build context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */
export interface BuildContext {
  config: BuildConfig;
  tracker: Tracker;
  logger: Logger;
  collaborators: BuildCollaborators;
  verbose?: boolean;

  repositories?: RepositoryMap; // Preflight: repositories present on disk
  catalog?: PageCatalog; // Scanner
  sitePages?: SitePages; // Structure, replaced by interlinker
  toc?: TableOfContents; // Writer
}
