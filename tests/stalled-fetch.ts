import { vi } from "vitest";

// A fetch that never answers and rejects the way undici does once the signal aborts.
export function stubStalledFetch() {
  const fetchMock = vi.fn(
    (_input: string | URL, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          reject(Object.assign(new Error("This operation was aborted"), { name: "AbortError" }));
        });
      })
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}
