/**
 * Error types surfaced by the post-thumbs CLI.
 */

/**
 * Invalid command-line input. The CLI prints the message with usage help
 * and exits with code 2.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * The content API rejected the configured API key.
 */
export class AuthenticationError extends Error {
  readonly status = 401;

  constructor(readonly originalError?: unknown) {
    super(
      'Authentication failed: Invalid or missing API key\n' +
      '\n💡 To fix this:\n' +
      '   • Verify POST_THUMBS_API_KEY in your .env file\n' +
      '   • Or set "apiKey" in post-thumbs.config.json\n' +
      '   • Check that the key has permission to edit records and metadata'
    );
    this.name = 'AuthenticationError';
  }
}
