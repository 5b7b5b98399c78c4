/**
 * Raised when a pool catalog breaks a registry invariant or cannot be loaded.
 * Thrown at startup only; routing never sees it.
 */
export class PoolRegistryError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'PoolRegistryError';
  }
}
