/**
 * HEAD probe for image URLs
 * Never throws: transport failures come back as `inconclusive`.
 */
import { Agent, fetch } from 'undici';
import { hasPlaceholderMarker } from './heuristics.js';
import type { ImageProbe, ProbeOptions, ProbeResult } from './types.js';

let insecureAgent: Agent | null = null;

function getInsecureAgent(): Agent {
    if (!insecureAgent) {
        insecureAgent = new Agent({ connect: { rejectUnauthorized: false } });
    }
    return insecureAgent;
}

export function interpretHeadResponse(
    status: number,
    finalUrl: string,
    headers: { get(name: string): string | null },
    minImageBytes: number
): ProbeResult {
    if (status < 200 || status >= 300) {
        return { outcome: 'inconclusive', status, reason: `HTTP ${status}` };
    }

    if (finalUrl && hasPlaceholderMarker(finalUrl)) {
        return { outcome: 'placeholder', status, reason: `redirected to ${finalUrl}` };
    }

    const contentType = headers.get('content-type');
    if (contentType && !contentType.toLowerCase().startsWith('image/')) {
        return { outcome: 'inconclusive', status, reason: `unexpected content-type ${contentType}` };
    }

    const contentLength = headers.get('content-length');
    if (contentLength && /^\d+$/.test(contentLength) && Number(contentLength) < minImageBytes) {
        return { outcome: 'placeholder', status, reason: `content-length ${contentLength} below ${minImageBytes}` };
    }

    return { outcome: 'genuine', status };
}

export const headProbe: ImageProbe = async (url: string, options: ProbeOptions): Promise<ProbeResult> => {
    try {
        const response = await fetch(url, {
            method: 'HEAD',
            redirect: 'follow',
            signal: AbortSignal.timeout(options.timeoutMs),
            dispatcher: options.verifyTls ? undefined : getInsecureAgent(),
        });
        return interpretHeadResponse(response.status, response.url, response.headers, options.minImageBytes);
    } catch (error) {
        const reason = error instanceof Error && error.name === 'TimeoutError'
            ? `timed out after ${options.timeoutMs}ms`
            : error instanceof Error ? error.message : String(error);
        return { outcome: 'inconclusive', status: null, reason };
    }
};

/**
 * Release the insecure agent's sockets (end of run)
 */
export async function closeProbeAgents(): Promise<void> {
    if (insecureAgent) {
        const agent = insecureAgent;
        insecureAgent = null;
        await agent.close();
    }
}
