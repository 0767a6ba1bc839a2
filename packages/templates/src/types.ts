import type { Logger } from "@stockroom/core";

/**
 * A parsed template file and the key derived from its path.
 *
 * For `<root>/templates/reports/aws/rds/instances.yaml` the category tag is
 * `reports` and the name is `aws.rds.instances`.
 */
export interface TemplateRecord {
  readonly categoryTag: string;
  readonly name: string;
  /** `<categoryTag>.<name>` */
  readonly key: string;
  readonly filePath: string;
  readonly content: unknown;
}

export interface ScanTemplatesOptions {
  /** Directory name that marks template trees (default: "templates") */
  readonly templatesDirName?: string;
  /** Accepted file extensions, leading dot (default: .yaml, .yml) */
  readonly extensions?: readonly string[];
  /** Directory names never descended into below a root (default: node_modules) */
  readonly ignoreDirs?: readonly string[];
  readonly logger?: Logger;
}

export interface TemplateScanResult {
  /** Accepted templates, in discovery order */
  readonly templates: readonly TemplateRecord[];
  /** Files dropped because an earlier file had the same key */
  readonly duplicates: number;
  /** Files dropped for a malformed path or unparseable content */
  readonly skipped: number;
}
