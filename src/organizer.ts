import path from 'path';
import bytes from 'bytes';
import _ from 'lodash';
import * as core from '@actions/core';
import * as fsPromise from 'fs/promises';
import { Utils } from './utils';
import type {
  ClassifiedWheel,
  CopyFailure,
  GroupTotals,
  OrganizeSummary,
  OrganizerOptions,
  OutputDirectories,
  SizeGroup,
  WheelArtifact
} from './types';

const BANNER = '='.repeat(70);

export const classifyBySize = (size: number, sizeLimit: number): SizeGroup => (size > sizeLimit ? 'large' : 'small');

export const resolveOutputDirectories = (options: OrganizerOptions): OutputDirectories => {
  const root = path.resolve(options.workspace, options.outputRoot);

  return {
    packages: path.join(root, 'packages'),
    large: path.join(root, 'packages-large'),
    small: path.join(root, 'packages-small')
  };
};

export const validateEnvironment = async (
  options: OrganizerOptions
): Promise<{ artifactsDir: string; githubOutput: string }> => {
  core.info('Validating environment...');

  const githubOutput = options.githubOutput;

  if (githubOutput === undefined || _.isEmpty(githubOutput)) {
    Utils.error('This action must be run in a GitHub Actions environment.');
    throw new Error('GITHUB_OUTPUT environment variable not set!');
  }

  core.info(`GITHUB_OUTPUT is set to: ${githubOutput}`);

  const artifactsDir = path.resolve(options.workspace, options.artifactsDir);
  core.info(`Checking for artifacts directory at: ${artifactsDir}`);

  if (!(await Utils.checkPathExists(artifactsDir))) {
    const entries = await Utils.listDirectoryEntries(options.workspace);

    Utils.error(`Current working directory: ${options.workspace}`);
    Utils.error(
      `Contents of current directory: ${entries.length > 0 ? entries.map((entry) => `'${entry}'`).join(', ') : '(empty)'}`
    );

    throw new Error(`Artifacts directory not found at: ${artifactsDir}`);
  }

  if (!(await Utils.isDirectory(artifactsDir))) {
    throw new Error(`${artifactsDir} exists but is not a directory!`);
  }

  core.info(`Artifacts directory found: ${artifactsDir}`);

  return { artifactsDir, githubOutput };
};

export const prepareOutputDirectories = async (directories: OutputDirectories): Promise<void> => {
  core.info('Creating output directories...');

  for (const directory of [directories.packages, directories.large, directories.small]) {
    await fsPromise.mkdir(directory, { recursive: true });
    core.info(`Output directory ready: '${directory}'`);
  }
};

export const collectWheels = async (artifactsDir: string, extension: string): Promise<string[]> => {
  core.info(`Collecting '*${extension}' files from: ${artifactsDir}`);

  const wheels = await Utils.listFiles(`**/*${extension}`, artifactsDir);

  if (_.isEmpty(wheels)) {
    const files = await Utils.listFiles('**/*', artifactsDir);

    Utils.error(`No '*${extension}' files found in ${artifactsDir}`);

    if (_.isEmpty(files)) {
      Utils.error('Artifacts directory structure: (directory is empty)');
    } else {
      Utils.error(
        `Artifacts directory structure: ${files.map((file) => `'${Utils.relativeTo(artifactsDir, file)}'`).join(', ')}`
      );
    }

    throw new Error('Cannot proceed without any wheels!');
  }

  core.info(`Found ${wheels.length} wheels to process`);

  return wheels;
};

export const organizeWheels = async (
  wheelPaths: string[],
  directories: OutputDirectories,
  options: Pick<OrganizerOptions, 'sizeLimit' | 'progressInterval'>
): Promise<OrganizeSummary> => {
  const total = wheelPaths.length;
  const large: GroupTotals = { count: 0, totalSize: 0 };
  const small: GroupTotals = { count: 0, totalSize: 0 };
  const wheels = new Array<ClassifiedWheel>();
  const failures = new Array<CopyFailure>();

  for (let index = 0; index < total; index++) {
    const wheelPath = wheelPaths[index];
    const name = path.basename(wheelPath);

    try {
      const artifact: WheelArtifact = { path: wheelPath, name, size: (await fsPromise.stat(wheelPath)).size };
      const group = classifyBySize(artifact.size, options.sizeLimit);
      const totals = group === 'large' ? large : small;

      totals.count++;
      totals.totalSize += artifact.size;

      const wheel: ClassifiedWheel = {
        ...artifact,
        group,
        destination: path.join(group === 'large' ? directories.large : directories.small, name),
        copied: false
      };
      wheels.push(wheel);

      await Utils.copyPreservingTimestamps(wheel.path, wheel.destination);
      wheel.copied = true;
    } catch (error) {
      const message = Utils.errorMessage(error);

      failures.push({ name, path: wheelPath, message });
      Utils.warning(`Failed to process ${name}: ${message}`);
    }

    const processed = index + 1;

    if (processed % options.progressInterval === 0 || processed === total) {
      core.info(`Progress: ${processed}/${total} wheels (${Math.floor((processed * 100) / total)}%)`);
    }
  }

  return { total, large, small, wheels, failures };
};

export const mirrorSmallWheels = async (directories: OutputDirectories, extension: string): Promise<number> => {
  const smallWheels = await Utils.listFiles(`*${extension}`, directories.small);

  core.info(`Copying ${smallWheels.length} small wheels to packages directory...`);

  for (const wheelPath of smallWheels) {
    await Utils.copyPreservingTimestamps(wheelPath, path.join(directories.packages, path.basename(wheelPath)));
  }

  return smallWheels.length;
};

const listDirectoryWheels = async (directory: string, extension: string): Promise<WheelArtifact[]> => {
  const wheels = new Array<WheelArtifact>();

  for (const wheelPath of await Utils.listFiles(`*${extension}`, directory)) {
    wheels.push({ path: wheelPath, name: path.basename(wheelPath), size: (await fsPromise.stat(wheelPath)).size });
  }

  return wheels;
};

export const reportSummary = async (
  summary: OrganizeSummary,
  directories: OutputDirectories,
  options: Pick<OrganizerOptions, 'sizeLimit' | 'sampleSize' | 'extension'>
): Promise<void> => {
  const limitLabel = bytes.format(options.sizeLimit) ?? `${options.sizeLimit}B`;

  core.info(BANNER);
  core.info('Wheel Organization Complete!');
  core.info(BANNER);
  core.info(`Total wheels: ${summary.total}`);
  core.info(
    `  Large wheels (>${limitLabel}): ${summary.large.count} -> GitHub Releases (${Utils.formatSize(summary.large.totalSize, 'GB', 2)})`
  );
  core.info(
    `  Small wheels (<=${limitLabel}): ${summary.small.count} -> GitHub Pages (${Utils.formatSize(summary.small.totalSize, 'MB', 1)})`
  );
  core.info(BANNER);

  // listed from the directories, so wheels kept from earlier runs show up too
  const largeWheels = _.orderBy(await listDirectoryWheels(directories.large, options.extension), (wheel) => wheel.size, 'desc');
  const smallWheels = await listDirectoryWheels(directories.small, options.extension);

  for (const [label, group] of [
    ['Large', largeWheels],
    ['Small', smallWheels]
  ] as const) {
    if (_.isEmpty(group)) {
      continue;
    }

    const sample = _.take(group, options.sampleSize);

    core.info(`${label} wheels (showing ${sample.length} of ${group.length}):`);
    sample.forEach((wheel) => core.info(`  - ${wheel.name} (${Utils.formatSize(wheel.size, 'MB', 1)})`));
  }

  if (!_.isEmpty(summary.failures)) {
    Utils.warning(
      `${summary.failures.length} wheels could not be copied: ${summary.failures.map((failure) => `'${failure.name}'`).join(', ')}`
    );
  }
};

export const publishReleaseTag = async (githubOutput: string, now: Date = new Date()): Promise<string> => {
  const releaseTag = Utils.createReleaseTag(now);

  core.info('Setting GitHub Actions output...');

  try {
    await Utils.appendOutput(githubOutput, 'release_tag', releaseTag);
  } catch (error) {
    throw new Error(`Failed to write to GITHUB_OUTPUT: ${Utils.errorMessage(error)}`);
  }

  core.info(`Release tag set: ${releaseTag}`);
  core.info('Successfully wrote to GITHUB_OUTPUT');

  return releaseTag;
};

export const runOrganizer = async (
  options: OrganizerOptions,
  now: Date = new Date()
): Promise<{ summary: OrganizeSummary; mirrored: number; releaseTag: string }> => {
  const { artifactsDir, githubOutput } = await validateEnvironment(options);
  const directories = resolveOutputDirectories(options);

  await prepareOutputDirectories(directories);

  const wheelPaths = await collectWheels(artifactsDir, options.extension);
  const summary = await organizeWheels(wheelPaths, directories, options);
  const mirrored = await mirrorSmallWheels(directories, options.extension);

  await reportSummary(summary, directories, options);

  const releaseTag = await publishReleaseTag(githubOutput, now);

  return { summary, mirrored, releaseTag };
};
