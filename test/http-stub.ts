import { AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export type StubReply = { status: number; data?: unknown } | Error;

/**
 * In-process axios adapter answering with the given replies in order.
 * Calls beyond the list get a 500.
 */
export function stubAdapter(...replies: StubReply[]) {
  const adapter = jest.fn<Promise<AxiosResponse>, [InternalAxiosRequestConfig]>();
  adapter.mockImplementation(async config => ({
    data: '',
    status: 500,
    statusText: '500',
    headers: {},
    config,
  }));

  for (const reply of replies) {
    adapter.mockImplementationOnce(async config => {
      if (reply instanceof Error) throw reply;
      return {
        data: reply.data ?? '',
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
      };
    });
  }

  return adapter;
}

export function requestOf(adapter: ReturnType<typeof stubAdapter>, call = 0): InternalAxiosRequestConfig {
  return adapter.mock.calls[call][0];
}
