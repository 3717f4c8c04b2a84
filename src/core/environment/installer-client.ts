import type {
  DistributionInfo,
  Environment,
  EnvironmentCreator,
  PackageSpec,
  ToolResult,
  ToolRunner
} from '../../types/index.js';
import { BOOTSTRAP_DISTRIBUTIONS } from '../../constants/index.js';
import { InstallError, MetadataError, ProvisionError } from '../../utils/errors.js';
import { describeCommand } from '../../utils/process.js';
import { toInstallerArgument } from '../../utils/package-spec.js';
import { logger } from '../../utils/logger.js';

export interface ToolchainSettings {
  /** Interpreter that creates environments */
  python: string;
  creator: EnvironmentCreator;
  /** Upgrade the environment's own installer right after creation */
  upgradeInstaller: boolean;
}

const QUIET_INSTALLER_ENV = { PIP_DISABLE_PIP_VERSION_CHECK: '1' };

const NOT_FOUND_MARKER = 'Package(s) not found';

function parseShowOutput(output: string): DistributionInfo | null {
  let name: string | undefined;
  let version: string | undefined;
  for (const line of output.split('\n')) {
    const separator = line.indexOf(':');
    if (separator < 0) continue;
    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    if (key === 'Name') name = value;
    if (key === 'Version') version = value;
  }
  return name && version ? { name, version } : null;
}

function parseListOutput(output: string): DistributionInfo[] {
  // pip may print warnings around the JSON document
  const start = output.indexOf('[');
  const end = output.lastIndexOf(']');
  if (start < 0 || end < start) {
    throw new MetadataError('Installer returned no package list');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(output.slice(start, end + 1));
  } catch (error) {
    throw new MetadataError('Installer returned an unreadable package list', { error });
  }
  if (!Array.isArray(parsed)) {
    throw new MetadataError('Installer returned an unreadable package list');
  }

  const result: DistributionInfo[] = [];
  for (const entry of parsed) {
    if (typeof entry === 'object' && entry !== null && 'name' in entry && 'version' in entry) {
      const { name, version } = entry;
      if (typeof name === 'string' && typeof version === 'string') {
        result.push({ name, version });
      }
    }
  }
  return result;
}

/**
 * Thin client over the external environment-creation tool and the package
 * installer living inside each environment.
 */
export class InstallerClient {
  constructor(
    private readonly runTool: ToolRunner,
    private readonly settings: ToolchainSettings
  ) {}

  private async run(command: string, args: string[], env?: Record<string, string>): Promise<ToolResult & { commandLine: string }> {
    const result = await this.runTool({ command, args, env });
    return { ...result, commandLine: describeCommand(command, args) };
  }

  /**
   * Create an environment at the given path.
   *
   * @throws ProvisionError on a non-zero exit
   */
  async createEnvironment(path: string): Promise<void> {
    logger.debug(`Creating ${this.settings.creator} environment at ${path}`);
    const result = await this.run(this.settings.python, ['-m', this.settings.creator, path]);
    if (result.exitCode !== 0) {
      throw new ProvisionError('Failed to create environment', {
        command: result.commandLine,
        exitCode: result.exitCode,
        output: result.output
      });
    }
  }

  /**
   * Bring the environment's own installer up to date, when configured to.
   *
   * @throws ProvisionError on a non-zero exit
   */
  async prepareInstaller(env: Environment): Promise<void> {
    if (!this.settings.upgradeInstaller) {
      return;
    }
    logger.debug(`Ensuring latest installer in ${env.path}`);
    const result = await this.run(env.installer, ['install', '--upgrade', 'pip', '--quiet'], QUIET_INSTALLER_ENV);
    if (result.exitCode !== 0) {
      throw new ProvisionError('Failed to upgrade the environment installer', {
        command: result.commandLine,
        exitCode: result.exitCode,
        output: result.output
      });
    }
  }

  /**
   * Install (or upgrade in place) a package into the environment.
   *
   * @throws InstallError on a non-zero exit
   */
  async install(env: Environment, spec: PackageSpec, options: { upgrade?: boolean } = {}): Promise<void> {
    const args = ['install'];
    if (options.upgrade) {
      args.push('--upgrade');
    }
    args.push(toInstallerArgument(spec), '--quiet');

    const result = await this.run(env.installer, args, QUIET_INSTALLER_ENV);
    if (result.exitCode !== 0) {
      throw new InstallError(options.upgrade ? `Failed to upgrade '${spec.name}'` : `Failed to install '${spec.name}'`, {
        command: result.commandLine,
        exitCode: result.exitCode,
        output: result.output
      });
    }
  }

  /**
   * Metadata of one installed distribution, or null when it is not installed.
   *
   * @throws MetadataError when the query itself fails
   */
  async show(env: Environment, distribution: string): Promise<DistributionInfo | null> {
    const result = await this.run(env.installer, ['show', distribution], QUIET_INSTALLER_ENV);
    if (result.exitCode !== 0) {
      if (result.output.includes(NOT_FOUND_MARKER)) {
        return null;
      }
      throw new MetadataError(`'${result.commandLine}' exited with code ${result.exitCode}`, {
        output: result.output
      });
    }
    return parseShowOutput(result.output);
  }

  /**
   * Installed distributions nothing else depends on, minus the bootstrap set.
   *
   * @throws MetadataError when the query fails
   */
  async listTopLevel(env: Environment): Promise<DistributionInfo[]> {
    const result = await this.run(env.installer, ['list', '--not-required', '--format', 'json'], QUIET_INSTALLER_ENV);
    if (result.exitCode !== 0) {
      throw new MetadataError(`'${result.commandLine}' exited with code ${result.exitCode}`, {
        output: result.output
      });
    }
    const bootstrap: readonly string[] = BOOTSTRAP_DISTRIBUTIONS;
    return parseListOutput(result.output).filter(d => !bootstrap.includes(d.name.toLowerCase()));
  }
}
