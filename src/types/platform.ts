/**
 * Platform type definitions
 * A platform selects which runner adapter tests a project
 */

import { z } from 'zod';

/**
 * Supported project platforms
 * - flutter: Dart/Flutter apps (pubspec.yaml)
 * - node: JavaScript/TypeScript packages (package.json)
 * - python: Python packages (pyproject.toml, setup.py, requirements.txt)
 * - go: Go modules (go.mod)
 * - rust: Cargo crates (Cargo.toml)
 * - dotnet: .NET projects (*.csproj, *.sln)
 */
export const PlatformSchema = z.enum([
  'flutter',
  'node',
  'python',
  'go',
  'rust',
  'dotnet',
]);
export type Platform = z.infer<typeof PlatformSchema>;

/**
 * One entry of the ordered marker table.
 * A directory matches when it contains any of `files`, or any file ending in one of `extensions`.
 */
export const PlatformMarkerSchema = z.object({
  platform: PlatformSchema,
  files: z.array(z.string().min(1)).default([]),
  extensions: z.array(z.string().min(1)).default([]),
});
export type PlatformMarker = z.infer<typeof PlatformMarkerSchema>;

/**
 * Human-readable platform labels for the discovery banner
 */
export const PLATFORM_LABELS: Record<Platform, string> = {
  flutter: 'Flutter',
  node: 'Node.js',
  python: 'Python',
  go: 'Go',
  rust: 'Rust',
  dotnet: '.NET',
};
