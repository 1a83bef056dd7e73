/**
 * Container runtime interface
 */

/**
 * A compose project on the deployment target
 */
export interface ServiceTarget {
  /** Compose project name */
  project: string;
  /** Directory holding the compose file and the generated .env */
  directory: string;
  /** Compose file relative to `directory`; the runtime's default otherwise */
  composeFile?: string;
}

/**
 * Drives service instances on the deployment target. Starting and stopping
 * are safe to repeat.
 */
export interface ContainerRuntime {
  /**
   * Whether the runtime daemon answers
   */
  isAvailable(): Promise<boolean>;

  isRunning(target: ServiceTarget): Promise<boolean>;

  /**
   * Start the target's services detached, removing orphans
   */
  start(target: ServiceTarget): Promise<void>;

  /**
   * Stop and remove the target's services, waiting up to `timeoutSeconds`
   * for a graceful shutdown
   */
  stop(target: ServiceTarget, timeoutSeconds: number): Promise<void>;

  /**
   * Kill the target's services and remove them
   */
  kill(target: ServiceTarget): Promise<void>;

  /**
   * Pull the images the target references
   */
  pull(target: ServiceTarget): Promise<void>;

  /**
   * Remove dangling images and unused networks
   */
  prune(): Promise<void>;
}
