/**
 * Error taxonomy for the scoring pipeline.
 *
 * Only ModelLoadError is fatal. DataQualityError and InvalidInputError are
 * isolated to the candidate that raised them: the pipeline logs them and moves
 * on. Empty survivor sets and infeasible parlays are plain values ([] / null).
 */

export class DataQualityError extends Error {
  public readonly code = 'DATA_QUALITY';
  public readonly candidateKey: string;
  public readonly feature: string;

  constructor(message: string, candidateKey: string, feature: string) {
    super(message);
    this.name = 'DataQualityError';
    this.candidateKey = candidateKey;
    this.feature = feature;
  }
}

export class InvalidInputError extends Error {
  public readonly code = 'INVALID_INPUT';
  public readonly field: string;

  constructor(message: string, field: string) {
    super(message);
    this.name = 'InvalidInputError';
    this.field = field;
  }
}

export class ModelLoadError extends Error {
  public readonly code = 'MODEL_LOAD_FAILED';
  public readonly artifactPath: string;

  constructor(message: string, artifactPath: string) {
    super(message);
    this.name = 'ModelLoadError';
    this.artifactPath = artifactPath;
  }
}
