/**
 * AWS client configuration for the DynamoDB and CloudWatch backed components.
 *
 * Credentials come from AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY when set,
 * otherwise from the AWS_PROFILE (or default) section of ~/.aws/credentials,
 * otherwise the SDK's default provider chain is left to resolve them.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export interface AWSCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

export interface AWSClientConfig {
  region?: string;
  credentials?: AWSCredentials;
}

export function readCredentialsFromProfile(
  profileName: string,
  credentialsPath: string = path.join(os.homedir(), '.aws', 'credentials')
): AWSCredentials | null {
  try {
    if (!fs.existsSync(credentialsPath)) {
      return null;
    }

    const values: Record<string, string> = {};
    let inProfile = false;
    for (const line of fs.readFileSync(credentialsPath, 'utf-8').split('\n')) {
      const trimmed = line.trim();
      if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
        if (inProfile) break;
        inProfile = trimmed === `[${profileName}]`;
        continue;
      }
      if (!inProfile) continue;
      const eq = trimmed.indexOf('=');
      if (eq > 0) {
        values[trimmed.slice(0, eq).trim()] = trimmed.slice(eq + 1).trim();
      }
    }

    const accessKeyId = values['aws_access_key_id'];
    const secretAccessKey = values['aws_secret_access_key'];
    if (!accessKeyId || !secretAccessKey) {
      return null;
    }
    const sessionToken = values['aws_session_token'];
    return { accessKeyId, secretAccessKey, ...(sessionToken ? { sessionToken } : {}) };
  } catch {
    // Unreadable credentials file; the SDK's default provider chain takes over
    return null;
  }
}

export function getAWSClientConfig(region?: string, env: NodeJS.ProcessEnv = process.env): AWSClientConfig {
  const config: AWSClientConfig = { region: region || env.AWS_REGION };

  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
      ...(env.AWS_SESSION_TOKEN ? { sessionToken: env.AWS_SESSION_TOKEN } : {}),
    };
    return config;
  }

  const profileCredentials = readCredentialsFromProfile(env.AWS_PROFILE || 'default');
  if (profileCredentials) {
    config.credentials = profileCredentials;
  }
  return config;
}
