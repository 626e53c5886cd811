/**
 * @fileoverview Append-only artifact registry shared by a build run
 */

import { Artifact, ArtifactType } from './artifact';

/** Predicate used to select artifacts */
export type ArtifactFilter = (artifact: Artifact) => boolean;

/**
 * Insertion-ordered collection of artifacts. `add` is synchronous and
 * nothing is ever removed or replaced.
 */
export class ArtifactRegistry {
  private readonly items: Artifact[] = [];

  /**
   * Append an artifact
   */
  add(artifact: Artifact): void {
    this.items.push(artifact);
  }

  /**
   * Snapshot of every artifact, in insertion order
   */
  list(): readonly Artifact[] {
    return [...this.items];
  }

  /**
   * Artifacts matching every given filter
   */
  filter(...filters: ArtifactFilter[]): readonly Artifact[] {
    return this.items.filter(artifact => filters.every(matches => matches(artifact)));
  }

  get size(): number {
    return this.items.length;
  }
}

/** Select artifacts of a type */
export const byType =
  (type: ArtifactType): ArtifactFilter =>
  artifact =>
    artifact.type === type;

/** Select artifacts for an operating system */
export const byGoos =
  (goos: string): ArtifactFilter =>
  artifact =>
    artifact.goos === goos;

/** Select artifacts for an architecture */
export const byGoarch =
  (goarch: string): ArtifactFilter =>
  artifact =>
    artifact.goarch === goarch;

/** Select artifacts produced by a build id */
export const byBuildId =
  (id: string): ArtifactFilter =>
  artifact =>
    artifact.extra.ID === id;
