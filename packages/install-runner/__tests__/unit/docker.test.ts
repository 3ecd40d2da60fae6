import { describe, it, expect } from 'vitest';
import { DockerStreamDemuxer } from '../../src/host/docker.js';
import type { DockerStreamType } from '../../src/host/docker.js';

function frame(type: number, payload: string): Buffer {
  const body = Buffer.from(payload, 'utf-8');
  const header = Buffer.alloc(8);
  header[0] = type;
  header.writeUInt32BE(body.length, 4);
  return Buffer.concat([header, body]);
}

function collect() {
  const frames: [DockerStreamType, string][] = [];
  const demuxer = new DockerStreamDemuxer((type, payload) => frames.push([type, payload.toString('utf-8')]));
  return { frames, demuxer };
}

describe('DockerStreamDemuxer', () => {
  it('should split stdout and stderr frames from one chunk', () => {
    const { frames, demuxer } = collect();

    demuxer.push(Buffer.concat([frame(1, 'installed\n'), frame(2, 'warning\n')]));

    expect(frames).toEqual([
      ['stdout', 'installed\n'],
      ['stderr', 'warning\n'],
    ]);
    expect(demuxer.pending).toBe(0);
  });

  it('should wait for frames split across chunks', () => {
    const { frames, demuxer } = collect();
    const data = frame(1, 'hello world');

    demuxer.push(data.subarray(0, 5));
    expect(frames).toEqual([]);
    expect(demuxer.pending).toBe(5);

    demuxer.push(data.subarray(5, 12));
    expect(frames).toEqual([]);

    demuxer.push(data.subarray(12));
    expect(frames).toEqual([['stdout', 'hello world']]);
    expect(demuxer.pending).toBe(0);
  });

  it('should drop stdin frames', () => {
    const { frames, demuxer } = collect();

    demuxer.push(Buffer.concat([frame(0, 'ignored'), frame(1, 'kept')]));

    expect(frames).toEqual([['stdout', 'kept']]);
  });
});
