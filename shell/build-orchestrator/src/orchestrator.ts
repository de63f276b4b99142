import { mkdir } from "fs/promises";
import { join } from "path";
import {
  copyFileAtomic,
  getErrorMessage,
  writeFileAtomic,
} from "@slidesmith/utils";
import type { Logger, ProgressCallback } from "@slidesmith/utils";
import {
  SchemaRejectionError,
  requireValidSchema,
  validateFile,
} from "@slidesmith/schema";
import type { PresentationSchema } from "@slidesmith/schema";
import { deriveAssetSpecs } from "@slidesmith/assets";
import type { AssetMaterializer, MaterializeReport } from "@slidesmith/assets";
import { PointerError, StructuralError } from "@slidesmith/versioning";
import type { BuildVersionRef, VersionManager } from "@slidesmith/versioning";
import { BuildStateMachine, isTerminalState } from "./build-states";
import type { BuildState, TerminalBuildState } from "./build-states";
import { buildConfigSchema } from "./config";
import type { BuildConfig, BuildConfigInput } from "./config";
import { BuildCancelledError } from "./errors";
import { createRuntimeSlides, serializeRuntimeSlides } from "./runtime-slides";
import { copyTemplates } from "./templates";

export interface BuildOrchestratorDependencies {
  materializer: AssetMaterializer;
  versionManager: VersionManager;
  logger: Logger;
  config?: BuildConfigInput | undefined;
}

export interface BuildOptions {
  /** Build into this directory, without versioning */
  outputDir?: string | undefined;
  /** Set to false to build into `<outputRoot>/<short_name>` directly */
  versioned?: boolean | undefined;
  signal?: AbortSignal | undefined;
  onProgress?: ProgressCallback | undefined;
}

export interface BuildReport {
  state: TerminalBuildState;
  schemaPath: string;
  /** Validation faults, or the error that failed the build */
  errors: string[];
  warnings: string[];
  buildDir: string | undefined;
  /** Undefined for unversioned builds */
  version: number | undefined;
  previousVersion: number | undefined;
  migratedLegacy: boolean;
  carriedForward: number;
  assets: MaterializeReport | undefined;
  history: BuildState[];
}

interface BuildTarget {
  buildDir: string;
  projectDir: string | undefined;
  version: number | undefined;
  previous: BuildVersionRef | undefined;
  migratedLegacy: boolean;
}

/**
 * Validate → allocate version → carry forward → materialize → finalize
 *
 * Rejected schemas and structural failures end the run; per-asset failures
 * are collected into the report and the build still completes.
 */
export class BuildOrchestrator {
  private readonly materializer: AssetMaterializer;
  private readonly versionManager: VersionManager;
  private readonly logger: Logger;
  private readonly config: BuildConfig;

  constructor(deps: BuildOrchestratorDependencies) {
    this.materializer = deps.materializer;
    this.versionManager = deps.versionManager;
    this.logger = deps.logger.child("BuildOrchestrator");
    this.config = buildConfigSchema.parse(deps.config ?? {});
  }

  public async build(
    schemaPath: string,
    options: BuildOptions = {},
  ): Promise<BuildReport> {
    const machine = new BuildStateMachine((from, to) =>
      this.logger.debug(`Build state: ${from} -> ${to}`),
    );
    const report: Omit<BuildReport, "state" | "history"> = {
      schemaPath,
      errors: [],
      warnings: [],
      buildDir: undefined,
      version: undefined,
      previousVersion: undefined,
      migratedLegacy: false,
      carriedForward: 0,
      assets: undefined,
    };
    const { signal } = options;

    try {
      const validation = await validateFile(schemaPath);
      report.warnings.push(...validation.warnings);
      const schema = requireValidSchema(validation);
      this.logger.info(`Schema valid: ${schema.meta.title}`, {
        slides: schema.slides.length,
        icons: schema.icons?.length ?? 0,
      });
      ensureNotCancelled(signal);

      machine.transition("allocating-version");
      const target = await this.resolveTarget(schema, options);
      report.buildDir = target.buildDir;
      report.version = target.version;
      report.previousVersion = target.previous?.version;
      report.migratedLegacy = target.migratedLegacy;
      await this.copySchema(schemaPath, target.buildDir);
      ensureNotCancelled(signal);

      machine.transition("carrying-forward");
      if (target.previous) {
        report.carriedForward = await this.versionManager.carryForward(
          target.previous.dir,
          target.buildDir,
          this.config.assetsDirName,
        );
      }
      ensureNotCancelled(signal);

      machine.transition("materializing");
      report.assets = await this.materializer.materialize(
        deriveAssetSpecs(schema),
        join(target.buildDir, this.config.assetsDirName),
        { signal, onProgress: options.onProgress },
      );
      ensureNotCancelled(signal);

      machine.transition("finalizing");
      report.warnings.push(...(await this.finalize(schema, target)));

      machine.transition("done");
      this.logger.info("Build complete", {
        buildDir: target.buildDir,
        version: target.version,
        failedAssets: report.assets.failed.length,
      });
    } catch (error) {
      if (error instanceof SchemaRejectionError) {
        machine.transition("rejected");
        report.errors.push(...error.errors);
        this.logger.warn(error.message, { schemaPath });
      } else {
        const failedIn = machine.state;
        machine.transition("failed");
        report.errors.push(getErrorMessage(error));
        this.logger.error(`Build failed during ${failedIn}`, getErrorMessage(error));
      }
    }

    const state = machine.state;
    if (!isTerminalState(state)) {
      throw new Error(`Build ended in non-terminal state ${state}`);
    }
    return { ...report, state, history: machine.getHistory() };
  }

  private async resolveTarget(
    schema: PresentationSchema,
    options: BuildOptions,
  ): Promise<BuildTarget> {
    const projectDir = join(this.config.outputRoot, schema.meta.short_name);

    if (options.outputDir !== undefined || options.versioned === false) {
      const buildDir = options.outputDir ?? projectDir;
      await createDirectory(buildDir);
      return {
        buildDir,
        projectDir: undefined,
        version: undefined,
        previous: undefined,
        migratedLegacy: false,
      };
    }

    const migrated = await this.versionManager.migrateLegacy(projectDir, projectDir);
    const previous = await this.versionManager.latestCompleteVersion(projectDir);
    const allocated = await this.versionManager.allocateVersion(projectDir);

    return {
      buildDir: allocated.dir,
      projectDir,
      version: allocated.version,
      previous,
      migratedLegacy: migrated !== undefined,
    };
  }

  private async copySchema(schemaPath: string, buildDir: string): Promise<void> {
    try {
      await copyFileAtomic(schemaPath, join(buildDir, this.config.schemaFileName));
    } catch (error) {
      throw new StructuralError(
        `Cannot copy schema into ${buildDir}: ${getErrorMessage(error)}`,
        { schemaPath, buildDir },
        error,
      );
    }
  }

  /**
   * Runtime slide list, templates, version metadata and the current pointer.
   * Returns warnings; a pointer failure is one of them.
   */
  private async finalize(
    schema: PresentationSchema,
    target: BuildTarget,
  ): Promise<string[]> {
    const warnings: string[] = [];
    const { buildDir } = target;

    try {
      await writeFileAtomic(
        join(buildDir, this.config.runtimeSlidesFileName),
        serializeRuntimeSlides(createRuntimeSlides(schema)),
      );
      if (this.config.templateDir !== undefined) {
        warnings.push(...(await copyTemplates(this.config.templateDir, buildDir)));
      }
    } catch (error) {
      throw new StructuralError(
        `Cannot write runtime files into ${buildDir}: ${getErrorMessage(error)}`,
        { buildDir },
        error,
      );
    }

    if (target.version === undefined || target.projectDir === undefined) {
      return warnings;
    }

    await this.versionManager.writeVersionMetadata(
      buildDir,
      target.version,
      target.previous?.version ?? null,
    );

    try {
      await this.versionManager.updateCurrentPointer(target.projectDir, target.version);
    } catch (error) {
      if (!(error instanceof PointerError)) throw error;
      this.logger.warn(error.message, error.context);
      warnings.push(error.message);
    }
    return warnings;
  }
}

async function createDirectory(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (error) {
    throw new StructuralError(
      `Cannot create build directory ${dir}: ${getErrorMessage(error)}`,
      { dir },
      error,
    );
  }
}

function ensureNotCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new BuildCancelledError();
  }
}
