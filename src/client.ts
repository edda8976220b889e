import { performance } from "node:perf_hooks";

import {
  DeliveryError,
  DeliveryErrorKind,
  ValidationError,
} from "./errors";
import { requestCounter, requestDuration, type RequestOutcome } from "./metrics";
import { UndiciTransport, type HttpTransport } from "./network/transport";
import type { Mapping, ParamInput, ParamRecord } from "./params/value";
import { RequestBuilder } from "./request/builder";
import { interpretResponse } from "./request/response";
import { log, setLogLevel } from "./utils/logger";
import type { ApiResponse, DeliveryClientConfig, Identifier } from "./types";

export type AutocompleteType = "address" | "locality" | "street" | "house";

export interface AutocompleteOptions {
  type?: AutocompleteType;
  /** Required for `street` and `house` unless geoId is given */
  localityName?: string;
  geoId?: Identifier;
  /** Required for `house` */
  street?: string;
}

export interface DeliverySearchQuery {
  cityFrom: string;
  cityTo: string;
  /** kg */
  weight: number;
  /** cm */
  width: number;
  height: number;
  length: number;
  /** Takes priority over cityTo when both are set */
  geoIdTo?: Identifier;
  geoIdFrom?: Identifier;
  /** Courier to the door or pickup point; all variants when omitted */
  deliveryType?: string;
  totalCost?: number;
  indexCity?: Identifier;
  toYdWarehouse?: number;
  orderCost?: number;
  assessedValue?: number;
}

/**
 * Order fields as the API names them, e.g. `order_num`, `recipient`,
 * `deliverypoint`, `delivery`, `order_items`.
 */
export type OrderParams = ParamRecord & {
  order_requisite?: Identifier | null;
  order_warehouse?: Identifier | null;
};

export interface DeliveryClientOptions {
  transport?: HttpTransport;
}

function outcomeOf(err: unknown): RequestOutcome {
  if (err instanceof DeliveryError) {
    switch (err.kind) {
      case DeliveryErrorKind.Protocol:
        return "protocol_error";
      case DeliveryErrorKind.MalformedResponse:
        return "malformed_response";
      default:
        return "transport_error";
    }
  }
  return "transport_error";
}

export class DeliveryClient {
  readonly config: DeliveryClientConfig;
  private readonly builder: RequestBuilder;
  private readonly transport: HttpTransport;

  constructor(config: DeliveryClientConfig, opts: DeliveryClientOptions = {}) {
    this.config = config;
    this.builder = RequestBuilder.fromConfig(config);
    this.transport = opts.transport ?? new UndiciTransport();
    setLogLevel(config.logLevel);
  }

  /**
   * Signs and sends one API call.
   *
   * @throws {ConfigurationError} no method key for `method`; nothing is sent
   * @throws {TransportError} network or HTTP failure, as raised by the transport
   * @throws {MalformedResponseError} body is not a JSON object
   * @throws {ProtocolError} API answered `status: "error"`
   */
  async request(
    method: string,
    params: ParamRecord | Mapping = {}
  ): Promise<ApiResponse> {
    const req = this.builder.build(method, params);

    log.verbose(`Sending ${method}`, { url: req.url, method });

    const t0 = performance.now();
    try {
      const raw = await this.transport.send(req.url, req.body, req.headers);
      const response = interpretResponse(raw);
      requestCounter.inc({ method, outcome: "ok" });
      log.debug(`${method} succeeded`, { url: req.url });
      return response;
    } catch (err) {
      const outcome = outcomeOf(err);
      requestCounter.inc({ method, outcome });
      if (outcome === "protocol_error" && err instanceof Error) {
        log.warn(`${method} rejected by API: ${err.message}`, { url: req.url });
      }
      throw err;
    } finally {
      requestDuration.observe({ method }, performance.now() - t0);
    }
  }

  /** Shop information for the configured sender */
  getSenderInfo(): Promise<ApiResponse> {
    return this.request("getSenderInfo");
  }

  getWarehouseInfo(warehouseId: Identifier): Promise<ApiResponse> {
    return this.request("getWarehouseInfo", { warehouse_id: warehouseId });
  }

  getRequisiteInfo(requisiteId: Identifier): Promise<ApiResponse> {
    return this.request("getRequisiteInfo", { requisite_id: requisiteId });
  }

  /**
   * Completes a partial city, street or house name.
   *
   * @throws {ValidationError} when `street`/`house` lacks a locality, or
   * `house` lacks a street
   */
  async autocomplete(
    term: string,
    opts: AutocompleteOptions = {}
  ): Promise<ApiResponse> {
    const type = opts.type ?? "address";
    if ((type === "street" || type === "house") && !(opts.geoId || opts.localityName)) {
      throw new ValidationError(`Type '${type}' requires geoId or localityName`);
    }
    if (type === "house" && !opts.street) {
      throw new ValidationError(`Type '${type}' requires street`);
    }

    return this.request("autocomplete", {
      term,
      type,
      locality_name: opts.localityName,
      geo_id: opts.geoId,
      street: opts.street,
    });
  }

  /** Postal index for a free-form address */
  getIndex(address: string): Promise<ApiResponse> {
    return this.request("getIndex", { address });
  }

  /** Available delivery options and prices for a parcel */
  searchDeliveryList(query: DeliverySearchQuery): Promise<ApiResponse> {
    return this.request("searchDeliveryList", {
      city_from: query.cityFrom,
      city_to: query.cityTo,
      weight: query.weight,
      width: query.width,
      height: query.height,
      length: query.length,
      geo_id_to: query.geoIdTo,
      geo_id_from: query.geoIdFrom,
      delivery_type: query.deliveryType,
      total_cost: query.totalCost,
      index_city: query.indexCity,
      to_yd_warehouse: query.toYdWarehouse,
      order_cost: query.orderCost,
      assessed_value: query.assessedValue,
    });
  }

  /**
   * Creates an order. `order_requisite` and `order_warehouse` fall back to
   * the first configured requisite and warehouse ids.
   */
  createOrder(order: OrderParams): Promise<ApiResponse> {
    const data: Record<string, ParamInput> = {};
    for (const [key, value] of Object.entries(order)) {
      if (value === undefined || value === null) continue;
      data[key] = value;
    }

    const [requisite] = this.config.requisiteIds;
    const [warehouse] = this.config.warehouseIds;
    if (!("order_requisite" in data) && requisite !== undefined) {
      data["order_requisite"] = requisite;
    }
    if (!("order_warehouse" in data) && warehouse !== undefined) {
      data["order_warehouse"] = warehouse;
    }

    return this.request("createOrder", data);
  }
}
