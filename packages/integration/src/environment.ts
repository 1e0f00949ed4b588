export enum EnvironmentType {
  Production = 'production',
  Sandbox = 'sandbox',
  Preview = 'preview',
}

/**
 * Resolve the environment type from the given name or the `ENV` variable. Unknown names are previews.
 */
export function getEnvironmentType(name?: string): EnvironmentType {
  const env = (name ?? process.env.ENV ?? '').trim().toLowerCase();

  switch (env) {
    case EnvironmentType.Production:
      return EnvironmentType.Production;
    case EnvironmentType.Sandbox:
      return EnvironmentType.Sandbox;
    default:
      return EnvironmentType.Preview;
  }
}

/**
 * Previews share the sandbox resources, only production has its own.
 */
export function getStableEnvironmentName(type: EnvironmentType = getEnvironmentType()): string {
  return type === EnvironmentType.Production ? EnvironmentType.Production : EnvironmentType.Sandbox;
}

export function isRunningInLambda(): boolean {
  // Always defined by the AWS Lambda runtime
  return process.env.AWS_LAMBDA_FUNCTION_NAME != null;
}
