/**
 * Client-side timing hooks fired by an instrumented connection.
 * Every method is optional; implement only the phases of interest.
 */
export interface TimingListener {
  onSerializationStart?(operationId: string): void;
  onSerializationComplete?(operationId: string, bytesSerialized: number): void;
  onWireTransmitStart?(operationId: string): void;
  onWireTransmitComplete?(operationId: string, bytesSent: number): void;
  onWireReceiveStart?(operationId: string): void;
  onWireReceiveComplete?(operationId: string, bytesReceived: number): void;
  onDeserializationStart?(operationId: string): void;
  onDeserializationComplete?(operationId: string, fieldsDeserialized: number): void;
}

/**
 * Per-connection totals, in nanoseconds and bytes
 */
export class ConnectionTimingMetrics {
  constructor(
    readonly serializationTimeNanos: number,
    readonly wireTransmitTimeNanos: number,
    readonly wireReceiveTimeNanos: number,
    readonly deserializationTimeNanos: number,
    readonly totalBytesSent: number,
    readonly totalBytesReceived: number,
    readonly operationCount: number
  ) {
    Object.freeze(this);
  }

  static empty(): ConnectionTimingMetrics {
    return new ConnectionTimingMetrics(0, 0, 0, 0, 0, 0, 0);
  }

  add(other: ConnectionTimingMetrics): ConnectionTimingMetrics {
    return new ConnectionTimingMetrics(
      this.serializationTimeNanos + other.serializationTimeNanos,
      this.wireTransmitTimeNanos + other.wireTransmitTimeNanos,
      this.wireReceiveTimeNanos + other.wireReceiveTimeNanos,
      this.deserializationTimeNanos + other.deserializationTimeNanos,
      this.totalBytesSent + other.totalBytesSent,
      this.totalBytesReceived + other.totalBytesReceived,
      this.operationCount + other.operationCount
    );
  }
}
