/**
 * The one error kind every stage of the pipeline reports with. Subclasses only
 * name the stage; callers are expected to read `message`.
 */
export class WanderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WanderError';
  }
}
