export type Environment = {
  /** The current environment. */
  name?: 'development' | 'production' | 'test';

  /** Whether the current environment is development. */
  development: boolean;

  /** Whether the current environment is production. */
  production: boolean;

  /** Whether the current environment is test. */
  test: boolean;

  /** The current commit SHA. */
  sha?: string;

  /** The current branch name. */
  branch?: string;
};

function getEnvironmentName(value?: string): Environment['name'] {
  switch (value) {
    case 'development':
    case 'production':
    case 'test':
      return value;
    default:
      return undefined;
  }
}

export function getEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  const name = getEnvironmentName(env.NODE_ENV);

  return {
    name,
    development: name === 'development',
    production: name === 'production',
    test: name === 'test',
    // GITHUB_SHA and GITHUB_REF_NAME are only set when running in a workflow
    sha: env.GITHUB_SHA || undefined,
    branch: env.GITHUB_REF_NAME || undefined,
  };
}

export const environment = getEnvironment();
