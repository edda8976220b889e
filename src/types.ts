export type LogLevel = "error" | "warn" | "info" | "verbose" | "debug" | "silly";

export type Identifier = string | number;

export interface DeliveryClientInit {
  /** Account id shown on the service's Integration → API settings page */
  clientId: Identifier;
  senderId: Identifier;
  warehouseIds?: Identifier[];
  requisiteIds?: Identifier[];
  /** Method name → method_key issued for it */
  methodKeys?: Record<string, string>;
  apiUrl?: string;
  apiVersion?: string;
  userAgent?: string;
  logLevel?: LogLevel;
}

/** Fully resolved, frozen configuration handed to the client once */
export interface DeliveryClientConfig {
  readonly clientId: Identifier;
  readonly senderId: Identifier;
  readonly warehouseIds: readonly Identifier[];
  readonly requisiteIds: readonly Identifier[];
  readonly methodKeys: Readonly<Record<string, string>>;
  readonly apiUrl: string;
  readonly apiVersion: string;
  readonly userAgent: string;
  readonly logLevel: LogLevel;
}

export interface ClientIdentity {
  readonly clientId: Identifier;
  readonly senderId: Identifier;
}

export type MethodSecrets = Readonly<Record<string, string>>;

export interface SignedRequest {
  readonly method: string;
  readonly url: string;
  readonly httpMethod: "POST";
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
  readonly signature: string;
}

/** Parsed body of a successful call */
export type ApiResponse = Readonly<Record<string, unknown>>;
