import { describeError, InfrastructureError } from './httpError';

/**
 * Runs a call into a dependency. Any failure comes back as an
 * `InfrastructureError` naming `serviceName`, so its detail stays out of the
 * response.
 */
export async function guardDependency<T>(serviceName: string, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    if (err instanceof InfrastructureError) throw err;
    throw new InfrastructureError(serviceName, describeError(err));
  }
}
