/**
 * App host model: backing containers and projects, the references between
 * them, and the environment each project receives at launch.
 */

import { Logger, createAppHostLogger } from '../utils/logger';
import { WeatherHubError, WeatherHubErrorType, toError } from '../utils/error-handler';
import { ComposeFile, ComposeService, ContainerRuntime, serializeCompose } from './container-runtime';

export type ProjectKind = 'api' | 'web';

export type ProjectEnvironment = Record<string, string>;

export interface RunningProject {
  url: string;
  stop(): Promise<void>;
}

export type ProjectLauncher = (kind: ProjectKind, env: ProjectEnvironment) => Promise<RunningProject>;

export interface ConnectionStringResource {
  readonly name: string;
  connectionString(): string;
}

function configurationError(message: string): WeatherHubError {
  return new WeatherHubError(message, WeatherHubErrorType.CONFIGURATION_ERROR, 'apphost');
}

export abstract class ContainerResource {
  constructor(
    readonly name: string,
    readonly image: string,
    readonly hostPort: number
  ) {}

  /** Compose services for this resource, keyed by service name */
  abstract toComposeServices(): Record<string, ComposeService>;
}

export class RedisResource extends ContainerResource implements ConnectionStringResource {
  private commanderPort: number | null = null;

  constructor(name: string, hostPort: number) {
    super(name, 'docker.io/library/redis:7.4', hostPort);
  }

  /**
   * Adds a Redis Commander container pointed at this instance
   */
  withRedisCommander(hostPort = 8081): this {
    this.commanderPort = hostPort;
    return this;
  }

  connectionString(): string {
    return `localhost:${this.hostPort}`;
  }

  toComposeServices(): Record<string, ComposeService> {
    const services: Record<string, ComposeService> = {
      [this.name]: {
        image: this.image,
        ports: [`${this.hostPort}:6379`],
        healthcheck: { test: ['CMD', 'redis-cli', 'ping'], interval: '5s', timeout: '3s', retries: 10 }
      }
    };

    if (this.commanderPort !== null) {
      services[`${this.name}-commander`] = {
        image: 'docker.io/rediscommander/redis-commander:latest',
        ports: [`${this.commanderPort}:8081`],
        environment: { REDIS_HOSTS: `${this.name}:${this.name}:6379` },
        depends_on: [this.name]
      };
    }

    return services;
  }
}

export interface PostgresOptions {
  hostPort: number;
  userName: string;
  password: string;
}

export class PostgresServerResource extends ContainerResource implements ConnectionStringResource {
  private database: PostgresDatabaseResource | null = null;

  constructor(name: string, private readonly options: PostgresOptions) {
    super(name, 'docker.io/library/postgres:17.0', options.hostPort);
  }

  /**
   * The database is created when the container first starts, so one per server
   */
  addDatabase(name: string): PostgresDatabaseResource {
    if (this.database) {
      throw configurationError(`Postgres server ${this.name} already has database ${this.database.name}`);
    }
    this.database = new PostgresDatabaseResource(name, this);
    return this.database;
  }

  getDatabase(): PostgresDatabaseResource | null {
    return this.database;
  }

  connectionString(): string {
    return `Host=localhost;Port=${this.hostPort};Username=${this.options.userName};Password=${this.options.password}`;
  }

  toComposeServices(): Record<string, ComposeService> {
    const environment: Record<string, string> = {
      POSTGRES_USER: this.options.userName,
      POSTGRES_PASSWORD: this.options.password
    };
    if (this.database) {
      environment.POSTGRES_DB = this.database.name;
    }

    return {
      [this.name]: {
        image: this.image,
        ports: [`${this.hostPort}:5432`],
        environment,
        healthcheck: {
          test: ['CMD-SHELL', `pg_isready -U ${this.options.userName}`],
          interval: '5s',
          timeout: '3s',
          retries: 10
        }
      }
    };
  }
}

export class PostgresDatabaseResource implements ConnectionStringResource {
  constructor(readonly name: string, readonly server: PostgresServerResource) {}

  connectionString(): string {
    return `${this.server.connectionString()};Database=${this.name}`;
  }
}

export type ProjectReference = ConnectionStringResource | ProjectResource;

export class ProjectResource {
  private references: ProjectReference[] = [];
  private external = false;

  constructor(readonly name: string, readonly kind: ProjectKind, private port: number) {}

  withReference(resource: ProjectReference): this {
    if (resource === this) {
      throw configurationError(`Project ${this.name} cannot reference itself`);
    }
    this.references.push(resource);
    return this;
  }

  withHttpEndpoint(port: number): this {
    this.port = port;
    return this;
  }

  withExternalHttpEndpoints(): this {
    this.external = true;
    return this;
  }

  getReferences(): ProjectReference[] {
    return [...this.references];
  }

  getHttpPort(): number {
    return this.port;
  }

  isExternal(): boolean {
    return this.external;
  }

  getUrl(): string {
    return `http://localhost:${this.port}`;
  }

  /**
   * Variables the project is launched with
   */
  environment(shared: ProjectEnvironment = {}): ProjectEnvironment {
    const env: ProjectEnvironment = {
      ...shared,
      NODE_ENV: 'development',
      PORT: String(this.port),
      OTEL_SERVICE_NAME: this.name
    };

    for (const reference of this.references) {
      if (reference instanceof ProjectResource) {
        env[`services__${reference.name}__http__0`] = reference.getUrl();
      } else {
        env[`ConnectionStrings__${reference.name}`] = reference.connectionString();
      }
    }

    return env;
  }
}

const DEFAULT_PROJECT_PORTS: Record<ProjectKind, number> = {
  api: 5000,
  web: 5001
};

export class DistributedApplicationBuilder {
  private containers: ContainerResource[] = [];
  private projects: ProjectResource[] = [];
  private names = new Set<string>();

  constructor(readonly applicationName: string = 'weather-hub') {}

  addRedis(name: string, hostPort = 6379): RedisResource {
    return this.addContainer(new RedisResource(name, hostPort));
  }

  addPostgres(name: string, options: Partial<PostgresOptions> = {}): PostgresServerResource {
    return this.addContainer(new PostgresServerResource(name, {
      hostPort: 5432,
      userName: 'postgres',
      password: 'postgres',
      ...options
    }));
  }

  addProject(name: string, kind: ProjectKind): ProjectResource {
    this.reserveName(name);
    const project = new ProjectResource(name, kind, DEFAULT_PROJECT_PORTS[kind]);
    this.projects.push(project);
    return project;
  }

  build(runtime: ContainerRuntime, launcher: ProjectLauncher, logger?: Logger): DistributedApplication {
    const ports = new Map<number, string>();
    for (const project of this.projects) {
      const owner = ports.get(project.getHttpPort());
      if (owner) {
        throw configurationError(`Projects ${owner} and ${project.name} both use port ${project.getHttpPort()}`);
      }
      ports.set(project.getHttpPort(), project.name);
    }

    return new DistributedApplication(
      this.applicationName,
      [...this.containers],
      orderProjects(this.projects),
      runtime,
      launcher,
      logger || createAppHostLogger()
    );
  }

  private addContainer<T extends ContainerResource>(resource: T): T {
    this.reserveName(resource.name);
    this.containers.push(resource);
    return resource;
  }

  private reserveName(name: string): void {
    if (!/^[a-z][a-z0-9-]*$/.test(name)) {
      throw configurationError(`Invalid resource name: ${name}`);
    }
    if (this.names.has(name)) {
      throw configurationError(`Resource ${name} is already defined`);
    }
    this.names.add(name);
  }
}

/**
 * Referenced projects come before the projects that reference them
 */
export function orderProjects(projects: ProjectResource[]): ProjectResource[] {
  const ordered: ProjectResource[] = [];
  const visiting = new Set<ProjectResource>();

  const visit = (project: ProjectResource): void => {
    if (ordered.includes(project)) {
      return;
    }
    if (visiting.has(project)) {
      throw configurationError(`Reference cycle through project ${project.name}`);
    }
    visiting.add(project);
    for (const reference of project.getReferences()) {
      if (reference instanceof ProjectResource) {
        visit(reference);
      }
    }
    visiting.delete(project);
    ordered.push(project);
  };

  projects.forEach(visit);
  return ordered;
}

export class DistributedApplication {
  private running: Array<{ project: ProjectResource; instance: RunningProject }> = [];
  private containersStarted = false;

  constructor(
    readonly name: string,
    private readonly containers: ContainerResource[],
    private readonly projects: ProjectResource[],
    private readonly runtime: ContainerRuntime,
    private readonly launcher: ProjectLauncher,
    private readonly logger: Logger
  ) {}

  /**
   * Compose document for the container resources
   */
  manifest(): ComposeFile {
    const services: Record<string, ComposeService> = {};
    for (const container of this.containers) {
      Object.assign(services, container.toComposeServices());
    }
    return { name: this.name, services };
  }

  manifestYaml(): string {
    return serializeCompose(this.manifest());
  }

  getProjects(): ProjectResource[] {
    return [...this.projects];
  }

  /**
   * Start containers, then each project with its injected environment
   */
  async run(shared: ProjectEnvironment = {}): Promise<void> {
    if (this.running.length > 0 || this.containersStarted) {
      throw configurationError(`Application ${this.name} is already running`);
    }

    try {
      if (this.containers.length > 0) {
        await this.runtime.up(this.manifest());
        this.containersStarted = true;
      }

      for (const project of this.projects) {
        this.logger.info(`Starting ${project.name}`, { kind: project.kind, port: project.getHttpPort() });
        const instance = await this.launcher(project.kind, project.environment(shared));
        this.running.push({ project, instance });
      }
    } catch (error) {
      this.logger.error('Application failed to start; stopping what was started', toError(error));
      await this.stop();
      throw error;
    }

    for (const { project, instance } of this.running) {
      const visibility = project.isExternal() ? 'external' : 'internal';
      this.logger.info(`${project.name} ready`, { url: instance.url, endpoint: visibility });
    }
  }

  /**
   * Stop projects in reverse start order, then the containers
   */
  async stop(): Promise<void> {
    const running = this.running.reverse();
    this.running = [];

    for (const { project, instance } of running) {
      try {
        await instance.stop();
      } catch (error) {
        this.logger.error(`Failed to stop ${project.name}`, toError(error));
      }
    }

    if (this.containersStarted) {
      this.containersStarted = false;
      await this.runtime.down(this.manifest());
    }
  }
}
