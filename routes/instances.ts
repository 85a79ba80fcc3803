import type { Server, Socket } from "socket.io";
import { errorMessage, HostError, type HostErrorCode } from "../lib/errors";
import type {
  CreatedInstance,
  CreateInstanceRequest,
  InstanceManager,
  InstanceStatus,
  RemovalReport
} from "../lib/lifecycle";

export type Response<T> =
  | { success: true; data: T }
  | { success: false; error: string; code?: HostErrorCode };

type Callback<T> = (response: Response<T>) => void;

function fail<T>(callback: Callback<T>, label: string, error: unknown): void {
  console.error(`${label} error:`, error);
  callback({
    success: false,
    error: errorMessage(error),
    ...(error instanceof HostError ? { code: error.code } : {})
  });
}

// List registered instances with whatever metadata the store holds
export const listInstances = (manager: InstanceManager) => async (
  _data: unknown,
  callback: Callback<{ instances: Array<{ name: string; domain?: string; ssl?: boolean }> }>
) => {
  try {
    const names = await manager.list();
    const instances = names.map((name) => {
      const record = manager.describe(name);
      return record
        ? { name, domain: record.domain, ssl: record.ssl_enabled === 1 }
        : { name };
    });

    callback({
      success: true,
      data: { instances }
    });
  } catch (error) {
    fail(callback, 'List instances', error);
  }
};

export const createInstance = (manager: InstanceManager) => async (
  data: Partial<Record<keyof CreateInstanceRequest, unknown>>,
  callback: Callback<{ instance: CreatedInstance }>
) => {
  try {
    const name = data?.name;
    const domain = data?.domain;
    if (typeof name !== 'string' || typeof domain !== 'string' || !name || !domain) {
      callback({
        success: false,
        error: 'name and domain are required',
        code: 'validation'
      });
      return;
    }

    const instance = await manager.create({
      name,
      domain,
      enterprise: data.enterprise === true,
      ssl: data.ssl === true,
      email: typeof data.email === 'string' ? data.email : undefined
    });

    callback({
      success: true,
      data: { instance }
    });
  } catch (error) {
    fail(callback, 'Create instance', error);
  }
};

// Anything but confirm: true cancels the removal
export const removeInstance = (manager: InstanceManager) => async (
  data: { name: string; confirm?: boolean },
  callback: Callback<{ report: RemovalReport }>
) => {
  try {
    if (!data?.name) {
      callback({
        success: false,
        error: 'name is required',
        code: 'validation'
      });
      return;
    }

    const name = await manager.resolveRegistered(data.name);
    const report = await manager.remove(name, { confirm: () => data.confirm === true });

    callback({
      success: true,
      data: { report }
    });
  } catch (error) {
    fail(callback, 'Remove instance', error);
  }
};

export const getInstanceStatus = (manager: InstanceManager) => async (
  data: { name: string },
  callback: Callback<{ status: InstanceStatus }>
) => {
  try {
    const status = await manager.status(data?.name ?? '');
    callback({
      success: true,
      data: { status }
    });
  } catch (error) {
    fail(callback, 'Instance status', error);
  }
};

export default (manager: InstanceManager) => (server: Server, socket: Socket) => {
  socket.on("instances:list", listInstances(manager));
  socket.on("instances:create", createInstance(manager));
  socket.on("instances:remove", removeInstance(manager));
  socket.on("instances:status", getInstanceStatus(manager));
};
