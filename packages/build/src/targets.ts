/**
 * Build target matrix expansion and target identifier validation
 */

import { z } from 'zod';
import { BuildConfig, BuildError, BuildErrorCode } from '@crossbuild/core';
import { DEFAULT_CONFIG, DEFAULT_TARGET_AXES, PLATFORM_EXTENSIONS, TARGET_ENV } from './config';
import { Target } from './types';
import { createLogger } from './utils/logger';
import platformData from './data/platforms.json';

const logger = createLogger('targets');

const PlatformDataSchema = z.object({
  armVariants: z.array(z.string().min(1)),
  pairs: z.array(z.string().regex(/^[a-z0-9]+\/[a-z0-9]+$/, 'expected os/arch')),
});

export type PlatformData = z.infer<typeof PlatformDataSchema>;

/**
 * Supported os/arch pairs and arm variants
 */
export class PlatformTable {
  private readonly pairs: ReadonlySet<string>;
  private readonly variants: ReadonlySet<string>;

  constructor(data: PlatformData) {
    const parsed = PlatformDataSchema.parse(data);
    this.pairs = new Set(parsed.pairs);
    this.variants = new Set(parsed.armVariants);
  }

  /**
   * Whether the toolchain can target this os/arch pair
   */
  supports(os: string, arch: string): boolean {
    return this.pairs.has(`${os}/${arch}`);
  }

  /**
   * Whether an arm variant is known
   */
  isArmVariant(variant: string): boolean {
    return this.variants.has(variant);
  }

  /**
   * A new table with additional pairs and arm variants
   */
  extend(additions: Partial<PlatformData>): PlatformTable {
    return new PlatformTable({
      pairs: [...this.pairs, ...(additions.pairs ?? [])],
      armVariants: [...this.variants, ...(additions.armVariants ?? [])],
    });
  }

  /**
   * Every supported pair as `os/arch`
   */
  listPairs(): string[] {
    return [...this.pairs];
  }

  listArmVariants(): string[] {
    return [...this.variants];
  }
}

/** Platform table shipped with crossbuild */
export const defaultPlatforms = new PlatformTable(platformData);

/**
 * Target identifier of a target: `os_arch` or `os_arm_variant`
 */
export function formatTarget(target: Target): string {
  const base = `${target.os}_${target.arch}`;
  return target.arm ? `${base}_${target.arm}` : base;
}

/**
 * Parse and validate a target identifier
 */
export function parseTarget(identifier: string, table: PlatformTable = defaultPlatforms): Target {
  const invalid = (): BuildError =>
    new BuildError(BuildErrorCode.InvalidTarget, `${identifier} is not a valid build target`, {
      target: identifier,
    });

  const parts = identifier.split('_');
  if (parts.length < 2 || parts.length > 3) {
    throw invalid();
  }

  const [os, arch, arm] = parts;
  if (!os || !arch || !table.supports(os, arch)) {
    throw invalid();
  }

  if (arm === undefined) {
    return { os, arch };
  }

  if (arch !== 'arm' || !table.isArmVariant(arm)) {
    throw invalid();
  }

  return { os, arch, arm };
}

/**
 * Validate a target identifier, throwing an InvalidTarget error when it is not buildable
 */
export function validateTarget(identifier: string, table: PlatformTable = defaultPlatforms): void {
  parseTarget(identifier, table);
}

/**
 * Whether a target identifier is buildable
 */
export function isValidTarget(identifier: string, table: PlatformTable = defaultPlatforms): boolean {
  try {
    parseTarget(identifier, table);
    return true;
  } catch (error) {
    if (error instanceof BuildError && error.code === BuildErrorCode.InvalidTarget) {
      return false;
    }
    throw error;
  }
}

/**
 * Expand os/arch/arm lists into target identifiers, in product order.
 * Unsupported combinations are dropped.
 */
export function expandMatrix(
  goos: readonly string[],
  goarch: readonly string[],
  goarm: readonly string[],
  table: PlatformTable = defaultPlatforms
): string[] {
  const targets: string[] = [];
  const seen = new Set<string>();

  const push = (target: Target): void => {
    const identifier = formatTarget(target);
    if (!seen.has(identifier)) {
      seen.add(identifier);
      targets.push(identifier);
    }
  };

  for (const os of goos) {
    for (const arch of goarch) {
      if (!table.supports(os, arch)) {
        logger.debug(`skipping unsupported target ${os}_${arch}`);
        continue;
      }

      if (arch !== 'arm') {
        push({ os, arch });
        continue;
      }

      for (const arm of goarm) {
        if (!table.isArmVariant(arm)) {
          logger.debug(`skipping unknown arm variant ${os}_${arch}_${arm}`);
          continue;
        }
        push({ os, arch, arm });
      }
    }
  }

  return targets;
}

/**
 * Fill a build's target list and entry point. Returns a new configuration;
 * builds that already list targets keep them.
 */
export function withDefaults(build: BuildConfig, table: PlatformTable = defaultPlatforms): BuildConfig {
  const main = build.main || DEFAULT_CONFIG.MAIN;

  if (build.targets.length > 0) {
    return { ...build, main };
  }

  const goos = build.goos.length > 0 ? build.goos : DEFAULT_TARGET_AXES.GOOS;
  const goarch = build.goarch.length > 0 ? build.goarch : DEFAULT_TARGET_AXES.GOARCH;
  const goarm = build.goarm.length > 0 ? build.goarm : DEFAULT_TARGET_AXES.GOARM;

  const targets = expandMatrix(goos, goarch, goarm, table);
  logger.debug(`build ${build.id}: ${targets.length} targets`, targets);

  return { ...build, main, goos, goarch, goarm, targets };
}

/**
 * File extension of binaries built for a target
 */
export function extensionFor(target: Target): string {
  return PLATFORM_EXTENSIONS[`${target.os}_${target.arch}`] ?? PLATFORM_EXTENSIONS[target.os] ?? '';
}

/**
 * Toolchain environment selecting a target
 */
export function platformEnv(target: Target): Record<string, string> {
  const env: Record<string, string> = {
    [TARGET_ENV.OS]: target.os,
    [TARGET_ENV.ARCH]: target.arch,
  };
  if (target.arm) {
    env[TARGET_ENV.ARM] = target.arm;
  }
  return env;
}
