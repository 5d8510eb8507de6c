/**
 * Anything identified by a display name.
 *
 * Names are for display only and are not unique keys.
 */
export interface NamedEntity {
  readonly name: string;
  toString(): string;
}

/**
 * A single measurement taken on a given day.
 */
export class Observation {
  readonly day: number;
  readonly value: number;

  constructor(day: number, value: number) {
    this.day = day;
    this.value = value;
  }

  toString(): string {
    return String(this.value);
  }
}

/** A named participant with no further state. */
export class Person implements NamedEntity {
  readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * A patient in an inflammation study, with their day-ordered history.
 */
export class Patient implements NamedEntity {
  readonly name: string;
  private readonly history: Observation[] = [];

  constructor(name: string) {
    this.name = name;
  }

  get observations(): ReadonlyArray<Observation> {
    return this.history;
  }

  /**
   * Appends a new observation and returns it.
   *
   * Without `day`, the observation lands on the day after the latest one, or
   * day 0 for the first observation. An explicit `day` is stored as given,
   * even if it repeats or precedes an earlier day.
   */
  addObservation(value: number, day?: number): Observation {
    const last = this.history.at(-1);
    const observation = new Observation(
      day ?? (last ? last.day + 1 : 0),
      value
    );
    this.history.push(observation);
    return observation;
  }

  toString(): string {
    return this.name;
  }
}

/** A doctor and the patients under their care. */
export class Doctor implements NamedEntity {
  readonly name: string;
  private readonly caseload: Patient[] = [];

  constructor(name: string) {
    this.name = name;
  }

  /** Patients in the order they were added. */
  get patients(): ReadonlyArray<Patient> {
    return this.caseload;
  }

  addPatient(patient: Patient): void {
    this.caseload.push(patient);
  }

  toString(): string {
    return this.name;
  }
}
