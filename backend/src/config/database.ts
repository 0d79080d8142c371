import mongoose from 'mongoose';
import logger from 'jet-logger';

// Handle connection events
mongoose.connection.on('disconnected', () => {
  logger.warn('⚠️ MongoDB disconnected');
});

mongoose.connection.on('error', (err) => {
  logger.err(err, true);
});

const connectDB = async (mongoURI: string): Promise<void> => {
  if (!mongoURI) {
    throw new Error('MONGODB_URI is not defined in environment variables');
  }

  // Connection pool sized for concurrent pipeline workers
  await mongoose.connect(mongoURI, {
    maxPoolSize: 50,
    minPoolSize: 5,
    serverSelectionTimeoutMS: 5000,  // Timeout after 5s if can't connect
    socketTimeoutMS: 45000,          // Close sockets after 45s inactivity
    family: 4,              // Use IPv4, skip IPv6
  });

  logger.info('✅ MongoDB connected successfully');

  const dbName = mongoose.connection.db?.databaseName;
  if (dbName) {
    logger.info(`📊 Database: ${dbName}`);
  }
};

export default connectDB;
