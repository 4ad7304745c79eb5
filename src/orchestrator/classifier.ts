/**
 * Platform classification
 * Assigns exactly one platform to a candidate directory from an ordered marker table
 */

import { readdirSync } from 'node:fs';
import type { Platform, PlatformMarker } from '../types/platform.js';
import type { Project } from '../types/project.js';
import type { OrchestrationWarning } from '../types/diagnostics.js';
import type { Candidate } from './discoverer.js';

/**
 * Whether a marker matches a directory listing
 *
 * @param marker - Marker table entry
 * @param fileNames - Names of the directory's entries
 */
export function markerMatches(marker: PlatformMarker, fileNames: ReadonlySet<string>): boolean {
  if (marker.files.some((file) => fileNames.has(file))) {
    return true;
  }
  if (marker.extensions.length === 0) {
    return false;
  }
  for (const name of fileNames) {
    if (marker.extensions.some((ext) => name.endsWith(ext))) {
      return true;
    }
  }
  return false;
}

/**
 * Classify a directory by its marker files.
 * Markers are evaluated top to bottom and the first match wins.
 *
 * @param dir - Directory to inspect
 * @param markers - Ordered marker table
 * @returns The platform, or null when no marker matches or the directory is unreadable
 */
export function classifyCandidate(dir: string, markers: readonly PlatformMarker[]): Platform | null {
  let fileNames: Set<string>;
  try {
    fileNames = new Set(readdirSync(dir));
  } catch {
    return null;
  }

  for (const marker of markers) {
    if (markerMatches(marker, fileNames)) {
      return marker.platform;
    }
  }
  return null;
}

export interface ClassificationResult {
  projects: Project[];
  /** Candidates rejected for lack of a platform marker */
  warnings: OrchestrationWarning[];
}

/**
 * Classify discovered candidates, preserving discovery order
 *
 * @param candidates - Discovered candidate directories
 * @param markers - Ordered marker table
 */
export function classifyCandidates(
  candidates: readonly Candidate[],
  markers: readonly PlatformMarker[]
): ClassificationResult {
  const projects: Project[] = [];
  const warnings: OrchestrationWarning[] = [];

  for (const candidate of candidates) {
    const platform = classifyCandidate(candidate.path, markers);
    if (!platform) {
      warnings.push({ kind: 'unclassified_platform', path: candidate.path });
      continue;
    }
    projects.push(
      Object.freeze({
        path: candidate.path,
        name: candidate.name,
        root: candidate.root,
        platform,
      })
    );
  }

  return { projects, warnings };
}
