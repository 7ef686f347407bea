/** Resolves true when the server answered with a 2xx status */
export type HealthProbe = (url: string, timeoutMs: number) => Promise<boolean>;

export const httpProbe: HealthProbe = async (url, timeoutMs) => {
  try {
    const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    await res.body?.cancel();
    return res.ok;
  } catch {
    // Connection refused until the server binds its port
    return false;
  }
};
