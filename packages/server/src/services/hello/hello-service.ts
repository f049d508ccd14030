import { z } from 'zod';
import type { ServiceDefinition } from '../../rpc/rpc-server.js';
import { parseRequest } from '../validation.js';
import type { HelloUsecase } from './hello-usecase.js';

export const HELLO_SERVICE_NAME = 'hello.HelloService';

export const GetHelloRequestSchema = z.object({
  name: z
    .string({ required_error: 'name is required' })
    .min(1, 'name is required')
    .max(100, 'name must be at most 100 characters'),
});

export type GetHelloRequest = z.infer<typeof GetHelloRequestSchema>;

export interface GetHelloResponse {
  message: string;
}

export function createHelloService(usecase: HelloUsecase): ServiceDefinition {
  return {
    name: HELLO_SERVICE_NAME,
    methods: {
      async GetHello(ctx, request): Promise<GetHelloResponse> {
        const { name } = parseRequest(GetHelloRequestSchema, request);
        ctx.logger.debug('GetHello called', { name });
        return { message: await usecase.getHello(name) };
      },
    },
  };
}
