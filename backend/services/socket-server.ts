import type { Server as HttpServer } from 'http';
import { Server as SocketIOServer, type Socket } from 'socket.io';
import { log, setLogListener } from 'backend/utils/log';
import { attachSocketConsumer, type ProgressChannel } from 'backend/apps/threat-intel/progress';

export interface SocketServerOptions {
  frontendUrl?: string;
  isProduction: boolean;
  progress: ProgressChannel;
}

/**
 * Socket.IO server for pipeline progress. Outside production it also
 * streams log lines to clients in the 'live-logs' room.
 */
export function initializeSocketIO(httpServer: HttpServer, options: SocketServerOptions): SocketIOServer {
  const io = new SocketIOServer(httpServer, {
    cors: {
      origin: options.isProduction
        ? options.frontendUrl || false
        : ['http://localhost:5174', 'http://localhost:5173'],
      credentials: true
    },
    path: '/socket.io/',
    transports: ['websocket', 'polling']
  });

  attachSocketConsumer(options.progress, io);

  io.on('connection', (socket: Socket) => {
    log(`Client connected: ${socket.id}`, 'socket-server');

    if (!options.isProduction) {
      socket.on('start_streaming', () => {
        socket.join('live-logs');
        socket.emit('logs-started', { message: 'Live log streaming started', timestamp: new Date() });
      });

      socket.on('stop_streaming', () => {
        socket.leave('live-logs');
        socket.emit('logs-stopped', { message: 'Live log streaming stopped', timestamp: new Date() });
      });
    }

    socket.on('disconnect', () => {
      log(`Client disconnected: ${socket.id}`, 'socket-server');
    });
  });

  if (!options.isProduction) {
    setLogListener((message, source, level) => {
      // Connection logs would feed back into themselves
      if (source === 'socket-server') return;
      io.to('live-logs').emit('log-entry', {
        message,
        source,
        level,
        timestamp: new Date().toISOString(),
      });
    });
  }

  log('Socket.IO server initialized', 'socket-server');
  return io;
}
