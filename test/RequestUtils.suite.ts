import { suite, test } from '@testdeck/mocha';
import { deepStrictEqual, equal } from 'node:assert';
import { RequestUtils } from '../src/utils';

@suite()
export class RequestUtilsSuite {
  @test()
  testGetPathFromStr(): void {
    equal(RequestUtils.getPathFromStr('/test'), '/test');
    equal(RequestUtils.getPathFromStr('/test?a=1&b=2'), '/test');
  }

  @test()
  testAppendForwardedFor(): void {
    equal(RequestUtils.appendForwardedFor(undefined, '127.0.0.1'), '127.0.0.1');
    equal(RequestUtils.appendForwardedFor('', '127.0.0.1'), '127.0.0.1');
    equal(RequestUtils.appendForwardedFor('10.0.0.1', '127.0.0.1'), '10.0.0.1, 127.0.0.1');
    equal(RequestUtils.appendForwardedFor(['10.0.0.1', ' 10.0.0.2 '], '127.0.0.1'), '10.0.0.1, 10.0.0.2, 127.0.0.1');
  }

  @test()
  testRemoveHopByHopHeaders(): void {
    const headers = RequestUtils.removeHopByHopHeaders({
      'connection': 'keep-alive, X-Custom-Hop',
      'keep-alive': 'timeout=5',
      'upgrade': 'websocket',
      'x-custom-hop': '1',
      'transfer-encoding': 'chunked',
      'accept': '*/*',
    });

    deepStrictEqual(headers, {
      'transfer-encoding': 'chunked',
      'accept': '*/*',
    });
  }

  @test()
  testPrepareProxyHeaders(): void {
    const headers = RequestUtils.prepareProxyHeaders(
      {
        'Host': 'proxy.test',
        'X-Remove': '1',
        'x-keep': 'yes',
      },
      {
        host: 'upstream.test:8080',
      },
      {
        'x-remove': null,
        'X-Added': ['a', 'b'],
      },
    );

    deepStrictEqual(headers, {
      'host': 'upstream.test:8080',
      'x-keep': 'yes',
      'x-added': ['a', 'b'],
    });
  }
}
