/**
 * Data exposed to templates
 */

import { formatInTimeZone } from 'date-fns-tz';
import { Context } from '@crossbuild/core';
import { DEFAULT_CONFIG } from '../config';
import { Target } from '../types';
import { TemplateValue } from './values';

const SHORT_COMMIT_LENGTH = 7;
const DATE_LAYOUT = "yyyy-MM-dd'T'HH:mm:ss'Z'";

/** Per-target values added when rendering for an artifact */
export interface ArtifactFields {
  target: Target;
  /** Output name, extension included */
  name: string;
  /** Resolved binary name, once known */
  binary?: string;
}

/**
 * Run-wide fields: project, version, git and time metadata and `Env`
 */
export function contextFields(ctx: Context): Map<string, TemplateValue> {
  const now = ctx.clock();
  const commit = ctx.git.commit;

  return new Map<string, TemplateValue>([
    ['ProjectName', ctx.projectName],
    ['Version', ctx.version],
    ['Tag', ctx.git.currentTag || DEFAULT_CONFIG.TAG],
    ['Commit', commit],
    ['ShortCommit', commit.slice(0, SHORT_COMMIT_LENGTH)],
    ['FullCommit', commit],
    ['Date', formatInTimeZone(now, 'UTC', DATE_LAYOUT)],
    ['Timestamp', Math.floor(now.getTime() / 1000)],
    ['Env', new Map<string, TemplateValue>(Object.entries(ctx.env))]
  ]);
}

/**
 * Target fields: `Os`, `Arch`, `Arm`, `ArtifactName` and `Binary` when known
 */
export function artifactFields(artifact: ArtifactFields): Map<string, TemplateValue> {
  const fields = new Map<string, TemplateValue>([
    ['Os', artifact.target.os],
    ['Arch', artifact.target.arch],
    ['Arm', artifact.target.arm ?? ''],
    ['ArtifactName', artifact.name]
  ]);
  if (artifact.binary !== undefined) {
    fields.set('Binary', artifact.binary);
  }
  return fields;
}
