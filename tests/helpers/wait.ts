/** Polls `cond` until it holds or `timeoutMs` passes. */
export const waitFor = async (cond: () => boolean, timeoutMs = 5_000, stepMs = 20): Promise<void> => {
  const deadline = Date.now() + timeoutMs;
  while (!cond()) {
    if (Date.now() > deadline) throw new Error(`condition not met within ${timeoutMs}ms`);
    await new Promise((resolve) => setTimeout(resolve, stepMs));
  }
};
