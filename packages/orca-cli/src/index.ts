import {
  createInstallConfig,
  runCli,
  runInstall,
  type Environment,
  type InstallArgs,
  type InstallResult,
  type ProjectDefinition,
  type RunInstallOptions,
} from '@binfetch/core'

export const PROJECT_NAME = 'orca-cli'
export const OWNER = 'orcasecurity'
export const REPO = 'orca-cli'

export const ORCA_CLI: ProjectDefinition = {
  name: PROJECT_NAME,
  owner: OWNER,
  repo: REPO,
  binary: 'orca-cli',
  displayName: 'Orca Security CLI',
  logPrefix: 'Orca-Cli',
  supportedPlatforms: ['darwin/amd64', 'darwin/arm64', 'linux/amd64', 'linux/arm64'],
  format: 'tar.gz',
  notices: {
    'darwin/arm64':
      "M1 CPU requires Rosetta 2, make sure you have it, or install it by running: " +
      "'/usr/sbin/softwareupdate --install-rosetta'",
  },
}

export async function installOrcaCli(
  args: InstallArgs = {},
  options: RunInstallOptions = {},
  env: Environment = process.env,
): Promise<InstallResult> {
  return runInstall(createInstallConfig(ORCA_CLI, args, env), options)
}

export function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  return runCli(ORCA_CLI, argv)
}
