import mongoose, { deleteModel, model, models, type Model, type Schema } from 'mongoose';
import { getConfig } from '@/lib/config';
import { logError, logInfo } from '@/lib/debug';

// Route handlers share one connection per server process
let connecting: Promise<typeof mongoose> | null = null;

export async function connectToDatabase(): Promise<typeof mongoose> {
  if (mongoose.connection.readyState === 1) {
    return mongoose;
  }

  if (!connecting) {
    const { MONGODB_URI, MONGODB_DB } = getConfig();
    connecting = mongoose
      .connect(MONGODB_URI, {
        dbName: MONGODB_DB,
        serverSelectionTimeoutMS: 30_000,
        connectTimeoutMS: 30_000,
        socketTimeoutMS: 30_000,
      })
      .then((connection) => {
        logInfo(`[db] connected to ${MONGODB_DB}`);
        return connection;
      })
      .catch((error: unknown) => {
        connecting = null;
        logError('Error connecting to MongoDB:', error);
        throw error;
      });
  }

  return connecting;
}

/**
 * Registers a model, replacing any earlier registration of the same name
 * (dev-server reloads evaluate model modules again).
 */
export function defineModel<T>(name: string, schema: Schema<T>): Model<T> {
  if (models[name]) {
    deleteModel(name);
  }
  return model<T>(name, schema);
}

// E11000: a write hit a unique index
export function isDuplicateKeyError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;
}
