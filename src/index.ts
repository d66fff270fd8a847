import dotenv from 'dotenv';

// Load environment variables before anything reads them
dotenv.config();

import { createServer } from 'http';
import mongoose from 'mongoose';
import { Server as SocketIOServer } from 'socket.io';
import { createApp } from './app';
import { loadConfig } from './config';
import { isTransportToken } from './middleware/auth';
import { MongoSchedulingStore } from './repositories/MongoSchedulingStore';
import { bootstrapAdmins } from './scripts/bootstrapAdmins';
import { buildServices } from './services';
import { NotificationService, SocketNotificationChannel, TRANSPORT_ROOM } from './services/notificationService';

const config = loadConfig();

const httpServer = createServer();
const io = new SocketIOServer(httpServer);

// Only the chat transport connects here; it proves itself with a token signed by JWT_SECRET
io.use((socket, next) => {
  const token: unknown = socket.handshake.auth?.token;
  if (typeof token === 'string' && isTransportToken(token, config.JWT_SECRET)) return next();
  next(new Error('Unauthorized'));
});

io.on('connection', (socket) => {
  void socket.join(TRANSPORT_ROOM);
  console.log('Transport connected:', socket.id);
  socket.on('disconnect', (reason) => {
    console.log(`Transport ${socket.id} disconnected: ${reason}`);
  });
});

const store = new MongoSchedulingStore({ transactions: config.MONGODB_TRANSACTIONS });
const dispatcher = new NotificationService(new SocketNotificationChannel(io, config.NOTIFY_ACK_TIMEOUT_MS));
const services = buildServices(store, dispatcher, config);

httpServer.on('request', createApp(services, { jwtSecret: config.JWT_SECRET }));

const connectDB = async () => {
  try {
    await mongoose.connect(config.MONGODB_URI);
    console.log('Connected to MongoDB successfully');
  } catch (error) {
    console.error('MongoDB connection error:', error);
    // Retry connection after 5 seconds
    console.log('Retrying connection in 5 seconds...');
    setTimeout(() => void connectDB(), 5000);
    return;
  }

  try {
    const granted = await bootstrapAdmins(services.staff, config.ADMIN_IDS);
    if (granted) console.log(`Ensured ${granted} configured admin(s)`);
  } catch (err) {
    console.error('Failed to seed configured admins:', err);
  }
  services.sweeper.start();
};

void connectDB();

httpServer.listen(config.PORT, () => {
  console.log(`Server running on port ${config.PORT}`);
});

const shutdown = (signal: string) => {
  console.log(`${signal} received, shutting down`);
  services.sweeper.stop();
  io.close();
  mongoose.disconnect()
    .catch(err => console.error('Error closing MongoDB connection:', err))
    .finally(() => process.exit(0));
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
