import mongoose from 'mongoose';

let connecting: Promise<typeof mongoose> | null = null;

/**
 * Connect once per process; later calls reuse the pending or open connection.
 */
export async function connectToDatabase(uri = process.env.MONGODB_URI): Promise<typeof mongoose> {
  if (mongoose.connection.readyState === 1) return mongoose;
  if (!uri) throw new Error('MONGODB_URI is not set');

  if (!connecting) {
    connecting = mongoose.connect(uri).then(
      (conn) => {
        console.log('[DB] Connected to MongoDB');
        return conn;
      },
      (error: unknown) => {
        connecting = null;
        throw error;
      }
    );
  }
  return connecting;
}

export async function disconnectFromDatabase(): Promise<void> {
  connecting = null;
  await mongoose.disconnect();
}
