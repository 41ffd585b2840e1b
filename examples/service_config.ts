// Example: decode a nested configuration object into tagged records and
// encode an updated record back into an attribute value.
import {
  BACKGROUND,
  type Converted,
  defineStruct,
  type Diagnostics,
  formatDiagnostic,
  ignore,
  intoStruct,
  ListType,
  MapType,
  NumberType,
  ObjectType,
  objectValueFrom,
  type ObjectValue,
  StringType,
  t,
  tag,
  type WireValue,
} from "../src/mod.ts";

export interface Listener {
  host: string;
  port: number;
}

export interface ServiceConfig {
  name: string;
  replicas: number;
  listeners: Listener[];
  labels: Record<string, string>;
  owner: string | null;
  /** Filled in at run time, never read from configuration. */
  startedAt: number;
}

export const ListenerShape = defineStruct<Listener>({
  name: "Listener",
  create: () => ({ host: "", port: 0 }),
  fields: {
    host: tag("host", t.string()),
    port: tag("port", t.integer()),
  },
});

export const ServiceConfigShape = defineStruct<ServiceConfig>({
  name: "ServiceConfig",
  create: () => ({
    name: "",
    replicas: 0,
    listeners: [],
    labels: {},
    owner: null,
    startedAt: 0,
  }),
  fields: {
    name: tag("name", t.string()),
    replicas: tag("replicas", t.integer()),
    listeners: tag("listeners", t.list(t.struct(ListenerShape))),
    labels: tag("labels", t.map(t.string())),
    owner: tag("owner", t.nullable(t.string())),
    startedAt: ignore(),
  },
});

const listenerAttributes = {
  host: new StringType(),
  port: new NumberType(),
};

export const serviceConfigAttributes = {
  name: new StringType(),
  replicas: new NumberType(),
  listeners: new ListType({
    elementType: new ObjectType({ attributeTypes: listenerAttributes }),
  }),
  labels: new MapType({ elementType: new StringType() }),
  owner: new StringType(),
};

export const serviceConfigType = new ObjectType({
  attributeTypes: serviceConfigAttributes,
});

/**
 * Reads a service configuration, returning the diagnostics as printable lines
 * when it does not convert.
 */
export function readServiceConfig(
  wire: WireValue,
): { config?: ServiceConfig; problems: string[] } {
  const result = intoStruct(
    BACKGROUND,
    serviceConfigType,
    wire,
    ServiceConfigShape,
  );
  return {
    config: result.diags.hasError() ? undefined : result.value,
    problems: problemLines(result.diags),
  };
}

/**
 * Builds the attribute value for a configuration with one more replica.
 */
export function scaleUp(config: ServiceConfig): Converted<ObjectValue> {
  return objectValueFrom(
    BACKGROUND,
    serviceConfigAttributes,
    ServiceConfigShape,
    { ...config, replicas: config.replicas + 1 },
  );
}

function problemLines(diags: Diagnostics): string[] {
  return diags.toArray().map(formatDiagnostic);
}
