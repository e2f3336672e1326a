export interface PipelineDocument {
  name: string;
  properties: PipelineProperties;
}

export interface PipelineProperties {
  description?: string;
  activities: Activity[];
}

export interface Activity {
  name: string;     // Also the target of dependency anchors
  type: string;
  description?: string;
  typeProperties?: ActivityTypeProperties;
  dependsOn: Dependency[];
}

export interface ActivityTypeProperties {
  source?: SourceDescriptor;
}

export interface Dependency {
  activity: string; // Upstream Activity.name
  /** Outcome tags such as "Succeeded" or "Failed". Only the first is rendered. */
  dependencyConditions: [string, ...string[]];
}

export interface SourceDescriptor {
  type: string;
  /** Present only when `type` has a known query field (see QUERY_FIELD_BY_SOURCE_TYPE). */
  query?: QueryValue;
}

export type QueryValue =
  | { kind: 'literal'; text: string }
  | { kind: 'expression'; text: string }
  /** Any other object. Rendered as its JSON text. */
  | { kind: 'opaque'; raw: Record<string, unknown> };

export type QueryValueKind = QueryValue['kind'];
