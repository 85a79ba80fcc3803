import bcrypt from "bcryptjs";
import type { Socket } from "socket.io";
import type { Store } from "./db";
import type { User } from "./models";

export class AuthError extends Error {
  readonly data = { code: "auth/401" };

  constructor() {
    super("Unauthorized User.");
    this.name = "AuthError";
  }
}

// Handshake credentials checked against the users table
export function authenticate(store: Store, auth: Record<string, unknown>): User | undefined {
  const { username, password } = auth;
  if (typeof username !== "string" || typeof password !== "string" || !username || !password) {
    return undefined;
  }

  const user = store.getUserByUsername(username);
  if (!user || !bcrypt.compareSync(password, user.password_hash)) {
    return undefined;
  }

  store.updateUserLastLogin(user.id);
  return user;
}

export function authMiddleware(store: Store) {
  return (socket: Socket, next: (err?: Error) => void) => {
    const user = authenticate(store, socket.handshake.auth);
    if (!user) {
      return next(new AuthError());
    }
    socket.data.user = { id: user.id, username: user.username, role: user.role };
    next();
  };
}
