import bytes from 'bytes';
import _ from 'lodash';
import * as core from '@actions/core';
import type { OrganizerOptions } from './types';

export const DEFAULT_SIZE_LIMIT = 100 * 1024 * 1024;

const readPositiveInteger = (name: string, fallback: number): number => {
  const configured = process.env[name];

  if (_.isEmpty(configured)) {
    return fallback;
  }

  const value = Number(configured);

  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${name}, must be a positive integer but got '${configured}'`);
  }

  return value;
};

export const resolveOptions = (workspace: string = process.cwd()): OrganizerOptions => {
  const artifactsDir = core.getInput('artifactsDir') || 'artifacts';
  const outputRoot = core.getInput('outputRoot') || 'pypi-repo';
  const extension = core.getInput('extension') || '.whl';
  const configuredLimit = core.getInput('sizeLimit');
  const sizeLimit = _.isEmpty(configuredLimit) ? DEFAULT_SIZE_LIMIT : bytes.parse(configuredLimit);

  if (sizeLimit === null || Number.isNaN(sizeLimit) || sizeLimit <= 0) {
    throw new Error(`Invalid sizeLimit, must be a positive size such as '100MB' but got '${configuredLimit}'`);
  }

  if (!/^\.[^\\/*?[\]{}]+$/.test(extension)) {
    throw new Error(`Invalid extension, must start with '.' and contain no path or glob characters: '${extension}'`);
  }

  return {
    workspace,
    artifactsDir,
    outputRoot,
    extension,
    sizeLimit,
    progressInterval: readPositiveInteger('ORGANIZE_OPTION_PROGRESS_INTERVAL', 50),
    sampleSize: readPositiveInteger('ORGANIZE_OPTION_SAMPLE_SIZE', 5),
    githubOutput: process.env.GITHUB_OUTPUT
  };
};
