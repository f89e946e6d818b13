import type { JsonDocument, JsonObject } from '@latency-lab/core';
import {
  type CommandFailedEvent,
  type CommandStartedEvent,
  type CommandSucceededEvent,
  type Document,
  MongoClient,
  MongoServerError,
} from 'mongodb';
import type { MongoDriver, MongoDriverSettings } from './types.js';

const DUPLICATE_KEY = 11000;
const AUTHENTICATION_FAILED = 18;

export function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof MongoServerError && error.code === DUPLICATE_KEY;
}

export function isAuthenticationError(error: unknown): boolean {
  return (
    error instanceof MongoServerError &&
    (error.code === AUTHENTICATION_FAILED || error.codeName === 'AuthenticationFailed')
  );
}

function rawDocuments(documents: Document[]): Uint8Array[] {
  return documents.map((doc) => {
    if (!Buffer.isBuffer(doc)) throw new Error('Expected a raw BSON reply');
    return doc;
  });
}

/**
 * Create a driver over one `MongoClient` with command monitoring enabled
 */
export function createMongoDriver(settings: MongoDriverSettings): MongoDriver {
  const client = new MongoClient(settings.uri, {
    maxPoolSize: settings.maxPoolSize,
    minPoolSize: settings.minPoolSize,
    connectTimeoutMS: settings.connectTimeoutMs,
    readPreference: settings.readPreference,
    writeConcern: { w: settings.writeConcern },
    monitorCommands: true,
    ...(settings.username !== undefined
      ? { auth: { username: settings.username, password: settings.password ?? '' } }
      : {}),
  });
  const db = client.db(settings.database);
  let open = true;

  const toDocuments = (pipeline: readonly JsonObject[]): Document[] => pipeline.map((stage) => ({ ...stage }));

  return {
    ping: async () => {
      await client.connect();
      await db.command({ ping: 1 });
    },

    findRawById: async (collection, id, options) => {
      const documents = await db
        .collection<JsonDocument>(collection)
        .find(
          { _id: id },
          {
            ...(options.projection ? { projection: options.projection } : {}),
            readPreference: options.readPreference,
            comment: options.comment,
            limit: 1,
            raw: true,
          }
        )
        .toArray();
      const [first] = rawDocuments(documents);
      return first ?? null;
    },

    insertOne: async (collection, document, options) => {
      await db.collection<JsonDocument>(collection).insertOne({ ...document }, { comment: options.comment });
    },

    updateOne: async (collection, id, set, options) => {
      const result = await db
        .collection<JsonDocument>(collection)
        .updateOne({ _id: id }, { $set: set }, { upsert: options.upsert, comment: options.comment });
      return {
        matchedCount: result.matchedCount,
        modifiedCount: result.modifiedCount,
        upsertedCount: result.upsertedCount,
      };
    },

    deleteOne: async (collection, id, options) => {
      const result = await db.collection<JsonDocument>(collection).deleteOne({ _id: id }, { comment: options.comment });
      return result.deletedCount;
    },

    aggregateRaw: async (collection, pipeline, options) => {
      const documents = await db
        .collection(collection)
        .aggregate(toDocuments(pipeline), { comment: options.comment, raw: true })
        .toArray();
      return rawDocuments(documents);
    },

    explainFind: (collection, id) => db.collection<JsonDocument>(collection).find({ _id: id }).explain(),

    explainAggregate: (collection, pipeline, options) =>
      db
        .collection(collection)
        .aggregate(toDocuments(pipeline), options ? { comment: options.comment } : {})
        .explain(),

    createIndex: (collection, keys, name) =>
      db.collection(collection).createIndex(keys, name !== undefined ? { name } : {}),

    dropCollection: async (collection) => {
      try {
        return await db.dropCollection(collection);
      } catch (error) {
        if (error instanceof MongoServerError && error.codeName === 'NamespaceNotFound') return false;
        throw error;
      }
    },

    observe: (observer) => {
      const onStarted = (event: CommandStartedEvent) => {
        const comment: unknown = event.command.comment;
        observer.started({
          requestId: event.requestId,
          commandName: event.commandName,
          ...(typeof comment === 'string' ? { operationId: comment } : {}),
        });
      };
      const onSucceeded = (event: CommandSucceededEvent) => {
        observer.succeeded({ requestId: event.requestId, durationMs: event.duration });
      };
      const onFailed = (event: CommandFailedEvent) => {
        observer.failed({ requestId: event.requestId });
      };

      client.on('commandStarted', onStarted);
      client.on('commandSucceeded', onSucceeded);
      client.on('commandFailed', onFailed);
      return () => {
        client.off('commandStarted', onStarted);
        client.off('commandSucceeded', onSucceeded);
        client.off('commandFailed', onFailed);
      };
    },

    isOpen: () => open,

    close: async () => {
      open = false;
      await client.close();
    },
  };
}
