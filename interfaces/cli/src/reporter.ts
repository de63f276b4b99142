import type { ProgressNotification } from "@slidesmith/utils";
import type { ValidationReport } from "@slidesmith/schema";
import type { BuildReport } from "@slidesmith/builder";

const RULE = "=".repeat(50);

/**
 * Validation result as printed by `slidesmith validate`
 */
export function formatValidationReport(
  filePath: string,
  report: ValidationReport,
): string[] {
  const lines = [`📋 Validating: ${filePath}`, RULE];
  const { errors, warnings } = report;

  if (errors.length > 0) {
    lines.push("", `🚨 ${errors.length} error(s) found:`, ...errors.map((e) => `  ${e}`));
  }
  if (warnings.length > 0) {
    lines.push("", `⚠️  ${warnings.length} warning(s):`, ...warnings.map((w) => `  ${w}`));
  }

  lines.push("");
  if (errors.length > 0) {
    lines.push(`❌ Validation failed - ${errors.length} error(s) must be fixed`);
  } else if (warnings.length > 0) {
    lines.push(`✅ Validation passed - ${warnings.length} warning(s) (non-critical)`);
  } else {
    lines.push("✅ Validation passed - no errors or warnings found");
  }
  return lines;
}

/**
 * One line per processed asset, e.g. `🔄 [1/12] SLIDE-01-Intro.png generated`
 */
export function formatProgress(notification: ProgressNotification): string {
  const counter =
    notification.total !== undefined
      ? `[${notification.progress}/${notification.total}] `
      : "";
  return `🔄 ${counter}${notification.message ?? ""}`.trimEnd();
}

/**
 * Faults of a schema that `slidesmith generate` refuses to build
 */
export function formatSchemaRejection(
  schemaPath: string,
  report: ValidationReport,
): string[] {
  return [
    `❌ Schema validation failed: ${schemaPath}`,
    ...report.errors.map((error) => `  ${error}`),
    ...report.warnings.map((warning) => `⚠️  ${warning}`),
  ];
}

/**
 * Build summary as printed by `slidesmith generate`
 */
export function formatBuildReport(report: BuildReport): string[] {
  switch (report.state) {
    case "rejected":
      return formatSchemaRejection(report.schemaPath, report);
    case "failed":
      return [`❌ Build failed: ${report.errors.join("; ")}`];
    case "done":
      return formatCompletedBuild(report);
  }
}

function formatCompletedBuild(report: BuildReport): string[] {
  const lines = [`🎉 Build complete: ${report.buildDir ?? ""}`];

  if (report.version !== undefined) {
    const previous =
      report.previousVersion !== undefined ? ` (previous: v${report.previousVersion})` : "";
    lines.push(`📌 Version: v${report.version}${previous}`);
    if (report.migratedLegacy) {
      lines.push("📦 Migrated unversioned output to v1");
    }
    if (report.carriedForward > 0) {
      lines.push(`♻️  Carried forward ${report.carriedForward} asset(s)`);
    }
  }

  const assets = report.assets;
  if (assets) {
    lines.push(
      `🖼️  Assets: ${assets.succeeded.length} ready (${assets.generated} generated, ${assets.skipped} already present), ${assets.failed.length} failed`,
    );
  }
  lines.push(...report.warnings.map((warning) => `⚠️  ${warning}`));

  if (assets && assets.failed.length > 0) {
    lines.push("", "❌ Failed assets (re-run the same command to retry):");
    lines.push(
      ...assets.failed.map(
        (failure) => `  ${failure.filename} (${failure.kind}: ${failure.detail})`,
      ),
    );
  }
  return lines;
}
