// node-zklib ships no type declarations.
declare module 'node-zklib' {
    namespace ZKLib {
        type ConnectionType = 'tcp' | 'udp';

        interface BufferReply {
            data: Buffer;
            /** Set on short replies the UDP transport cannot chunk */
            mode?: number;
            /** Set when the transfer stopped part way */
            err?: Error | null;
        }

        interface Transport {
            readWithBuffer(
                request: Buffer,
                callbackInProcess?: (current: number, total: number) => void
            ): Promise<BufferReply>;
        }
    }

    class ZKLib {
        constructor(ip: string, port: number, timeout: number, inport: number);
        connectionType: ZKLib.ConnectionType | null;
        zklibTcp: ZKLib.Transport;
        zklibUdp: ZKLib.Transport;
        createSocket(cbErr?: (err: Error) => void, cbClose?: (type: string) => void): Promise<void>;
        /** Runs the callback for the open transport; failures reject as ZKError */
        functionWrapper<T>(tcpCallback: () => Promise<T>, udpCallback: () => Promise<T>, command?: string): Promise<T>;
        freeData(): Promise<unknown>;
        disconnect(): Promise<void>;
    }

    export = ZKLib;
}

declare module 'node-zklib/constants' {
    export const REQUEST_DATA: {
        GET_ATTENDANCE_LOGS: Buffer;
    };
}

declare module 'node-zklib/zkerror' {
    namespace zkerror {
        interface SocketError {
            message: string;
            code?: string;
        }

        class ZKError {
            constructor(err: SocketError, command: string, ip: string);
            err: SocketError;
            command: string;
            ip: string;
            toast(): string;
        }
    }

    export = zkerror;
}

declare module 'node-zklib/utils' {
    namespace utils {
        function decodeRecordData40(record: Buffer): { userSn: number; deviceUserId: string; recordTime: Date };
    }

    export = utils;
}
