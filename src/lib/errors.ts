export type Dependency = 'metadata-store' | 'notification-service';

export class MalformedEventError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Malformed upload event: ${issues.join('; ')}`);
    this.name = 'MalformedEventError';
    this.issues = issues;
  }
}

export class DependencyCallError extends Error {
  readonly dependency: Dependency;

  constructor(dependency: Dependency, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DependencyCallError';
    this.dependency = dependency;
  }
}
