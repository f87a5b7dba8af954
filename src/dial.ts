// src/dial.ts

import * as net from "net";
import { ConnectionError } from "./errors";

/**
 * Opens a connection to the given address. Implementations may wrap the
 * socket in whatever transport security the deployment needs.
 */
export type DialFunc = (address: string, signal?: AbortSignal) => Promise<net.Socket>;

/**
 * Splits "host:port" or "[ipv6]:port" into its parts.
 */
export function splitHostPort(address: string): { host: string; port: number } {
  let host: string;
  let portText: string;

  if (address.startsWith("[")) {
    const close = address.indexOf("]");
    if (close === -1 || address[close + 1] !== ":") {
      throw new ConnectionError("invalid address", address);
    }
    host = address.slice(1, close);
    portText = address.slice(close + 2);
  } else {
    const colon = address.lastIndexOf(":");
    if (colon === -1 || address.indexOf(":") !== colon) {
      throw new ConnectionError("invalid address", address);
    }
    host = address.slice(0, colon);
    portText = address.slice(colon + 1);
  }

  const port = Number(portText);
  if (!/^\d+$/.test(portText) || port > 65535) {
    throw new ConnectionError("invalid port", address);
  }
  return { host: host === "" ? "127.0.0.1" : host, port };
}

function openSocket(
  options: net.NetConnectOpts,
  address: string,
  signal?: AbortSignal,
): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ConnectionError("dial aborted", address, signal.reason));
      return;
    }

    const socket = net.createConnection(options);

    const cleanup = () => {
      socket.removeListener("connect", onConnect);
      socket.removeListener("error", onError);
      signal?.removeEventListener("abort", onAbort);
    };
    const onConnect = () => {
      cleanup();
      resolve(socket);
    };
    const onError = (err: Error) => {
      cleanup();
      socket.destroy();
      reject(new ConnectionError("failed to dial", address, err));
    };
    const onAbort = () => {
      cleanup();
      socket.destroy();
      reject(new ConnectionError("dial aborted", address, signal?.reason));
    };

    socket.once("connect", onConnect);
    socket.once("error", onError);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Dials a TCP address of the form "host:port".
 */
export const tcpDial: DialFunc = async (address, signal) => {
  const { host, port } = splitHostPort(address);
  return openSocket({ host, port }, address, signal);
};

/**
 * Dials a Unix socket. Addresses starting with "@" name a socket in the
 * abstract namespace.
 */
export const unixDial: DialFunc = async (address, signal) => {
  const path = address.startsWith("@") ? `\0${address.slice(1)}` : address;
  return openSocket({ path }, address, signal);
};
