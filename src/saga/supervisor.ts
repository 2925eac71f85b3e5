import { freezeArchiveRequest, type ArchiveRequest } from "../core/archive.js";
import { newSagaId, type SagaId } from "../core/ids.js";
import { archiveLogger } from "../logging.js";
import type { TransitionListener } from "./archiveSaga.js";
import { errorMessage, type SagaOutcome, type SagaState } from "./failures.js";

export interface SagaRunner {
  run(sagaId: SagaId, request: ArchiveRequest, onTransition?: TransitionListener): Promise<SagaOutcome>;
}

export interface SagaCrashed {
  status: "crashed";
  message: string;
}

export type SupervisedOutcome = SagaOutcome | SagaCrashed;

export interface SagaSnapshot {
  sagaId: SagaId;
  url: string;
  state: SagaState | "crashed";
  startedAt: string;
  finishedAt: string | null;
  outcome: SupervisedOutcome | null;
}

export interface LaunchedSaga {
  sagaId: SagaId;
  /** Settles with the saga's outcome; never rejects. */
  done: Promise<SupervisedOutcome>;
}

export const DEFAULT_RETAIN_FINISHED = 1000;

/**
 * Owns every running saga. Callers get the saga id back immediately; the work
 * continues in the background and any exception escaping a saga ends up in the
 * log and in its snapshot instead of an unhandled rejection.
 */
export class SagaSupervisor {
  private readonly log = archiveLogger("supervisor");
  private readonly running = new Map<SagaId, Promise<SupervisedOutcome>>();
  private readonly snapshots = new Map<SagaId, SagaSnapshot>();
  private readonly finishedOrder: SagaId[] = [];
  private readonly retainFinished: number;
  private readonly now: () => Date;

  constructor(
    private readonly runner: SagaRunner,
    opts: { retainFinished?: number; now?: () => Date } = {}
  ) {
    this.retainFinished = opts.retainFinished ?? DEFAULT_RETAIN_FINISHED;
    this.now = opts.now ?? (() => new Date());
  }

  launch(request: ArchiveRequest): LaunchedSaga {
    const sagaId = newSagaId();
    const frozen = freezeArchiveRequest(request);
    const snapshot: SagaSnapshot = {
      sagaId,
      url: frozen.url,
      state: "initiating",
      startedAt: this.now().toISOString(),
      finishedAt: null,
      outcome: null
    };
    this.snapshots.set(sagaId, snapshot);

    const done = Promise.resolve()
      .then(() =>
        this.runner.run(sagaId, frozen, (state) => {
          snapshot.state = state;
        })
      )
      .then(
        (outcome): SupervisedOutcome => outcome,
        (err: unknown): SupervisedOutcome => {
          this.log.fatal("Saga {sagaId} crashed: {error}", { sagaId, url: frozen.url, error: errorMessage(err) });
          snapshot.state = "crashed";
          return { status: "crashed", message: errorMessage(err) };
        }
      )
      .then((outcome) => {
        this.finish(snapshot, outcome);
        return outcome;
      });

    this.running.set(sagaId, done);
    this.log.info("Launched saga {sagaId} for {url}", { sagaId, url: frozen.url, inFlight: this.running.size });
    return { sagaId, done };
  }

  status(sagaId: SagaId): SagaSnapshot | null {
    const snapshot = this.snapshots.get(sagaId);
    return snapshot ? { ...snapshot } : null;
  }

  inFlight(): number {
    return this.running.size;
  }

  /** Waits for every saga, including ones launched while draining. */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running.values()]);
    }
  }

  private finish(snapshot: SagaSnapshot, outcome: SupervisedOutcome): void {
    snapshot.outcome = outcome;
    snapshot.finishedAt = this.now().toISOString();
    this.running.delete(snapshot.sagaId);
    this.log.debug("Saga {sagaId} finished with {status}", { sagaId: snapshot.sagaId, status: outcome.status });

    this.finishedOrder.push(snapshot.sagaId);
    while (this.finishedOrder.length > this.retainFinished) {
      const evicted = this.finishedOrder.shift();
      if (evicted !== undefined) this.snapshots.delete(evicted);
    }
  }
}
