/**
 * Default configuration values
 */

import type { Config } from './schema.js';

/**
 * Directory holding the default runner adapters, relative to the workspace root
 */
export const DEFAULT_RUNNERS_DIR = 'scripts/testing/runners';

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  discovery: {
    roots: ['apps', 'packages', 'services'],
  },
  platforms: {
    markers: [
      { platform: 'flutter', files: ['pubspec.yaml'], extensions: [] },
      { platform: 'node', files: ['package.json'], extensions: [] },
      { platform: 'python', files: ['pyproject.toml', 'setup.py', 'requirements.txt'], extensions: [] },
      { platform: 'go', files: ['go.mod'], extensions: [] },
      { platform: 'rust', files: ['Cargo.toml'], extensions: [] },
      { platform: 'dotnet', files: [], extensions: ['.csproj', '.sln'] },
    ],
    adapters: {
      flutter: `${DEFAULT_RUNNERS_DIR}/flutter.sh`,
      node: `${DEFAULT_RUNNERS_DIR}/node.sh`,
      python: `${DEFAULT_RUNNERS_DIR}/python.sh`,
      go: `${DEFAULT_RUNNERS_DIR}/go.sh`,
      rust: `${DEFAULT_RUNNERS_DIR}/rust.sh`,
      dotnet: `${DEFAULT_RUNNERS_DIR}/dotnet.sh`,
    },
  },
  execution: {
    timeout_ms: 10 * 60 * 1000,
    kill_grace_ms: 2000,
  },
  output: {
    verbose: false,
    progress: true,
  },
};

/**
 * Configuration file names to search for
 */
export const CONFIG_FILE_NAMES = [
  'testfleet.config.yaml',
  'testfleet.config.yml',
  '.testfleetrc.yaml',
  '.testfleetrc.yml',
  '.testfleetrc',
];

/**
 * Environment variable names
 */
export const ENV_VARS = {
  TIMEOUT_MS: 'TESTFLEET_TIMEOUT_MS',
  LOG_LEVEL: 'TESTFLEET_LOG_LEVEL',
  NO_PROGRESS: 'TESTFLEET_NO_PROGRESS',
} as const;
