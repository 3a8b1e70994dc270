export class SessionIdExhaustedError extends Error {
  constructor(public readonly attempts: number) {
    super(`No free session identifier found after ${attempts} attempts`);
    this.name = "SessionIdExhaustedError";
  }
}
