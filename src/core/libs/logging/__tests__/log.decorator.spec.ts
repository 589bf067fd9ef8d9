import { beforeEach, describe, expect, it } from 'vitest'
import { LogEvent } from '@core/libs/logging/log.decorator'
import { CustomEvent } from '@core/events/custom-event'
import { LoggerStub } from './logger.stub'

class CheckoutService {
  constructor(readonly logger: LoggerStub) {}

  @LogEvent('order_processed')
  async placeOrder(orderId: string): Promise<string> {
    return `placed ${orderId}`
  }

  @LogEvent()
  async ping(): Promise<string> {
    return 'pong'
  }

  @LogEvent()
  async refund(_orderId: string): Promise<void> {
    throw new RangeError('nothing to refund')
  }
}

describe('LogEvent decorator', () => {
  const logger = new LoggerStub()
  const service = new CheckoutService(logger)

  beforeEach(() => {
    logger.reset()
  })

  it('should return the method result', async () => {
    await expect(service.placeOrder('o-1')).resolves.toBe('placed o-1')
  })

  it('should log a timed custom event on success', async () => {
    await service.placeOrder('o-1')

    expect(logger.log).toHaveBeenCalledTimes(1)
    expect(logger.log).toHaveBeenCalledWith('placeOrder completed', {
      event: expect.any(CustomEvent),
    })
    expect(logger.log.mock.calls[0][1]).toEqual({
      event: {
        name: 'order_processed',
        data: { method: 'placeOrder', status: 'success' },
        time_ms: expect.any(Number),
      },
    })
  })

  it('should default the event name to the method name', async () => {
    await service.ping()

    expect(logger.log.mock.calls[0][0]).toBe('ping completed')
    expect(logger.log.mock.calls[0][1]).toMatchObject({ event: { name: 'ping' } })
  })

  it('should log the thrown error as the event and rethrow', async () => {
    await expect(service.refund('o-2')).rejects.toThrow('nothing to refund')

    expect(logger.log).not.toHaveBeenCalled()
    expect(logger.error).toHaveBeenCalledWith('refund failed', {
      event: expect.any(RangeError),
      method: 'refund',
      time_ms: expect.any(Number),
      status: 'failure',
    })
  })
})
