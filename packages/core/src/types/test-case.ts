/**
 * Test case definitions loaded from a configuration document
 */

/**
 * HTTP methods the harness can issue
 */
export type HttpMethod = 'GET' | 'POST';

/**
 * How a case's payload travels on the wire
 *
 * - `form`: urlencoded `uid` / `data` fields
 * - `json`: the payload itself as a JSON body
 */
export type BodyEncoding = 'form' | 'json';

/**
 * A mapping or ordered sequence, eligible for canonical serialization.
 * Mappings loaded from YAML arrive as `Map` so their key order survives.
 */
export type StructuredValue =
  | ReadonlyMap<unknown, unknown>
  | readonly unknown[]
  | Readonly<Record<string, unknown>>;

/**
 * Payload of a case: structured, or a raw scalar sent as-is. Integers
 * beyond the safe range stay `bigint` so they reach the wire exactly.
 */
export type Payload = StructuredValue | string | number | bigint | boolean;

/**
 * Expected outcome of a case
 */
export interface Expectation {
  /** Exact HTTP status code */
  status?: number;
  /** Substring the rendered response must contain */
  contains?: string;
}

/**
 * One named request/expectation pair
 */
export interface TestCase {
  /** Case name, unique within a run */
  readonly name: string;
  /** Endpoint path relative to the base URL */
  readonly endpoint: string;
  readonly method: HttpMethod;
  readonly encoding: BodyEncoding;
  /** Identity token sent as `uid`; absent means not sent */
  readonly identity?: string;
  /** Payload sent as `data` (form) or as the body (json); absent means not sent */
  readonly payload?: Payload;
  /** Absent for exploratory cases */
  readonly expectation?: Readonly<Expectation>;
  readonly description?: string;
}

/**
 * A named group of cases, used for the report breakdown
 */
export interface Category {
  readonly name: string;
  /** Display label, e.g. "Normal cases" */
  readonly label?: string;
  readonly cases: readonly TestCase[];
}

/**
 * Which configuration document shape a run was loaded from
 */
export type ConfigShape = 'quest' | 'endpoints';

/**
 * Fully resolved run configuration
 */
export interface RunConfig {
  /** Path or label of the document the config came from */
  readonly source: string;
  readonly shape: ConfigShape;
  readonly baseUrl: string;
  /** Per-request timeout */
  readonly timeoutMs: number;
  /** Headers applied to every request */
  readonly headers: Readonly<Record<string, string>>;
  /** Categories in execution order */
  readonly categories: readonly Category[];
}
