export type EntityType = "skill" | "job_title" | "company" | "education" | "contact";

export type EntitySource = "model" | "rules";

export type ContactField = "email" | "phone" | "profile_url" | "name";

export interface Entity {
  readonly type: EntityType;
  readonly text: string;
  readonly confidence: number;
  readonly source: EntitySource;
  readonly contactField?: ContactField;
}

export interface ResumeProfile {
  readonly entities: ReadonlyArray<Entity>;
  readonly experienceYears?: number;
}

export type EntityExtractionOutcome =
  | {
      kind: "model";
      entities: ReadonlyArray<Entity>;
      experienceYears?: number;
    }
  | {
      kind: "rules";
      reason: "MODEL_UNAVAILABLE";
      detail: string;
      entities: ReadonlyArray<Entity>;
      experienceYears?: number;
    };
