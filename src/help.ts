// Third-party dependencies
import chalk from 'chalk';

export interface HelpTopic {
  title: string;
  content: string;
}

export const helpTopics: Record<string, HelpTopic> = {
  config: {
    title: 'Configuration File Format',
    content: `
Configuration File (JSON or YAML, default ".config.json"):
  source:
    accessKey: 'SOURCE_ACCESS_KEY'
    secretKey: 'SOURCE_SECRET_KEY'
    region: 'us-east-1'
    bucket: 'source-bucket-name'
    endpoint: 'https://s3.amazonaws.com'   # Optional, for S3 compatible services
    forcePathStyle: false                   # Optional

  destination:
    accessKey: 'DESTINATION_ACCESS_KEY'
    secretKey: 'DESTINATION_SECRET_KEY'
    region: 'eu-west-1'
    bucket: 'destination-bucket-name'

  # Optional parameters
  concurrency: 10          # Objects synchronized at once (default 10)
  maxRetries: 3            # Attempts per request (default 3)
  prefix: 'data/'
  include:
    - "\\.jpg$"
  exclude:
    - '^temp/'
  skipConfirmation: false
  verbose: false
  logFile: "./logs/sync.log"

  snake_case keys (access_key, secret_key, max_retries, ...) are accepted too.
    `
  },
  filters: {
    title: 'Filtering Options',
    content: `
Filtering Options:
  - prefix: Only list objects whose keys start with the specified prefix
    Example: prefix: "images/"

  - include: Only synchronize objects whose keys match any of the regex patterns
    Example:
      include:
        - "\\.jpg$"
        - "\\.png$"

  - exclude: Skip objects whose keys match any of the regex patterns
    Example:
      exclude:
        - "^temp/"

  Filters narrow the object set only. Bucket configuration is always synchronized.
    `
  },
  process: {
    title: 'Synchronization Process',
    content: `
Synchronization Process:
  1. Create the destination bucket if it does not exist
  2. Copy the bucket policy, versioning state and lifecycle rules
  3. List all objects in the source bucket (applying filters if specified)
  4. For each object, compare size and ETag with the destination:
     * missing or different: server-side copy with metadata, tags and storage class,
       then verify the destination size and ETag
     * identical: skip
  5. Display the summary

Error Handling:
  - Throttling and transient network errors are retried by the client (maxRetries)
  - A bucket configuration or listing error stops the run before any object is copied
  - The first object error stops new objects from starting; objects already in
    progress finish and are counted
  - A failed run exits with code 1, an invalid configuration with code 2

Objects deleted from the source are never deleted from the destination.
    `
  },
  permissions: {
    title: 'Required Permissions',
    content: `
Source account:
  s3:ListBucket, s3:GetObject, s3:GetObjectTagging,
  s3:GetBucketPolicy, s3:GetBucketVersioning, s3:GetLifecycleConfiguration

Destination account:
  s3:CreateBucket, s3:PutObject, s3:PutObjectTagging, s3:GetObject,
  s3:PutBucketPolicy, s3:PutBucketVersioning, s3:PutLifecycleConfiguration

Server-side copy runs with the destination credentials, so they also need
read access (s3:GetObject, s3:GetObjectTagging) to the source bucket.
    `
  }
};

/**
 * Display help information for a specific topic or list all available topics
 */
export function displayHelp(topic: string | undefined, programName: string): void {
  if (!topic) {
    console.log(chalk.blue.bold(`${programName} Help`));
    console.log(chalk.blue('─'.repeat(50)));
    console.log('Available help topics:');
    Object.entries(helpTopics).forEach(([key, helpTopic]) => {
      console.log(`  ${chalk.yellow(key)}: ${helpTopic.title}`);
    });
    console.log('\nUse:', chalk.yellow(`${programName} help <topic>`), 'for detailed information');
    return;
  }

  const helpTopic = helpTopics[topic];
  if (helpTopic) {
    console.log(chalk.blue.bold(helpTopic.title));
    console.log(chalk.blue('─'.repeat(50)));
    console.log(helpTopic.content);
  } else {
    console.log(chalk.red(`Unknown help topic: ${topic}`));
    console.log('Available topics:', Object.keys(helpTopics).join(', '));
  }
}
