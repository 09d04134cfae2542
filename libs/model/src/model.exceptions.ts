/**
 * Thrown when the model artifact cannot be read or fails validation.
 *
 * Raised while the module graph is being built, so it aborts startup
 * instead of serving requests against a broken model.
 */
export class ModelArtifactException extends Error {
  constructor(
    readonly artifactPath: string,
    readonly problems: readonly string[],
  ) {
    super(
      `Invalid model artifact at "${artifactPath}": ${problems.join('; ')}`,
    );
    this.name = 'ModelArtifactException';
  }
}
