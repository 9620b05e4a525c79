export type ComposeStage =
  | 'start'
  | 'validated'
  | 'no-media'
  | 'media-materialized'
  | 'normalized'
  | 'composed'
  | 'loaded'
  | 'error'
  | 'cleaned'
  | 'done';

const TRANSITIONS: Record<ComposeStage, readonly ComposeStage[]> = {
  start: ['validated', 'error'],
  validated: ['no-media', 'media-materialized', 'error'],
  'no-media': ['composed', 'error'],
  'media-materialized': ['normalized', 'error'],
  normalized: ['composed', 'error'],
  composed: ['loaded', 'error'],
  loaded: ['cleaned', 'error'],
  error: ['cleaned'],
  cleaned: ['done'],
  done: [],
};

export interface ComposeJobProps {
  readonly id: string;
  readonly createdAt: Date;
}

/**
 * Tracks one request through the preparation pipeline. Every stage change goes
 * through `advance`, which rejects moves the pipeline does not allow.
 */
export class ComposeJob {
  public readonly id: string;

  public readonly createdAt: Date;

  private currentStage: ComposeStage = 'start';

  private readonly visited: ComposeStage[] = ['start'];

  private constructor(props: ComposeJobProps) {
    this.id = props.id;
    this.createdAt = props.createdAt;
  }

  public static create(props: ComposeJobProps): ComposeJob {
    if (props.id.length === 0) {
      throw new Error('Compose job requires an id');
    }

    return new ComposeJob(props);
  }

  public get stage(): ComposeStage {
    return this.currentStage;
  }

  public get history(): readonly ComposeStage[] {
    return this.visited;
  }

  public get failed(): boolean {
    return this.visited.includes('error');
  }

  public advance(next: ComposeStage): void {
    if (!TRANSITIONS[this.currentStage].includes(next)) {
      throw new Error(`Illegal compose job transition ${this.currentStage} -> ${next}`);
    }

    this.currentStage = next;
    this.visited.push(next);
  }

  /** Moves to `error` unless the job already ended up there or past it. */
  public fail(): void {
    if (TRANSITIONS[this.currentStage].includes('error')) {
      this.advance('error');
    }
  }
}
