/**
 * Error shapes thrown by a mocked axios.
 */

export function axiosError(status: number, message = 'Request failed'): Error {
  return Object.assign(new Error(message), {
    isAxiosError: true as const,
    response: { status, data: {} },
  });
}

/** A request that never got a response (timeout, DNS, reset). */
export function networkError(message = 'socket hang up'): Error {
  return Object.assign(new Error(message), { isAxiosError: true as const });
}
