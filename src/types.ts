export type SizeGroup = 'large' | 'small';

export type WheelArtifact = {
  path: string;
  name: string;
  size: number;
};

export type ClassifiedWheel = WheelArtifact & {
  group: SizeGroup;
  destination: string;
  copied: boolean;
};

export type CopyFailure = {
  name: string;
  path: string;
  message: string;
};

export type GroupTotals = {
  count: number;
  totalSize: number;
};

export type OutputDirectories = {
  packages: string;
  large: string;
  small: string;
};

export type OrganizeSummary = {
  total: number;
  large: GroupTotals;
  small: GroupTotals;
  wheels: ClassifiedWheel[];
  failures: CopyFailure[];
};

export type OrganizerOptions = {
  workspace: string;
  artifactsDir: string;
  outputRoot: string;
  extension: string;
  sizeLimit: number;
  progressInterval: number;
  sampleSize: number;
  githubOutput?: string;
};
