/**
 * AWS Client Configuration Helper
 *
 * Builds SDK client configuration from the environment:
 * - AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY (direct credentials)
 * - AWS_ENDPOINT_URL (local DynamoDB / EventBridge emulators)
 * Anything else falls through to the SDK's default provider chain.
 */

export interface AWSClientConfig {
  region?: string;
  endpoint?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
  };
}

export function getAWSClientConfig(
  region?: string,
  env: NodeJS.ProcessEnv = process.env
): AWSClientConfig {
  const config: AWSClientConfig = { region: region || env.AWS_REGION };

  if (env.AWS_ENDPOINT_URL) {
    config.endpoint = env.AWS_ENDPOINT_URL;
  }

  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
      ...(env.AWS_SESSION_TOKEN ? { sessionToken: env.AWS_SESSION_TOKEN } : {}),
    };
  }

  return config;
}
