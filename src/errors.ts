export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: ConfigIssue[] = []
  ) {
    const formattedMessage = [message, ...issues.map((issue) => `  ${issue.path || '(root)'}: ${issue.message}`)].join(
      '\n'
    );
    super(formattedMessage);
    this.name = 'ConfigError';
  }
}

export class RenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RenderError';
  }
}
