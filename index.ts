import { createServer } from "http";
import "dotenv/config";

import { Server } from "socket.io";
import { authMiddleware } from "./lib/auth";
import { loadConfig } from "./lib/config";
import { createStore, openDatabase } from "./lib/db";
import { createHostEnvironment } from "./lib/host";
import { InstanceManager } from "./lib/lifecycle";
import instances from "./routes/instances";

const config = loadConfig();
const store = createStore(openDatabase(config.dbPath));
const manager = new InstanceManager(createHostEnvironment(config), store);
const registerInstances = instances(manager);

const server = createServer();
const io = new Server(server, {cors: {origin: "*"}});

// Authentication middleware
io.use(authMiddleware(store));

io.on("connection", (socket) => {
  console.log(`${socket.id}-> User connected`);

  try {
    registerInstances(io, socket);
  } catch (error) {
    console.error(error);
  }

  socket.on("disconnect", () => {
    console.log(`${socket.id}-> User disconnected`);
  });
});

server.listen(config.controlPort, () => {
  console.log(`Socket.IO server running on port ${config.controlPort}`);
});
