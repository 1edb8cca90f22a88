import { SerialPort } from 'serialport';

export interface SerialPortSummary {
    path: string;
    manufacturer?: string;
    serialNumber?: string;
    vendorId?: string;
    productId?: string;
}

export async function listSerialPorts(): Promise<SerialPortSummary[]> {
    const ports = await SerialPort.list();
    return ports.map(port => ({
        path: port.path,
        manufacturer: port.manufacturer,
        serialNumber: port.serialNumber,
        vendorId: port.vendorId,
        productId: port.productId,
    }));
}

export function formatPortList(ports: readonly SerialPortSummary[]): string {
    const lines: string[] = [];

    switch (ports.length) {
        case 0:
            lines.push('No ports found.');
            break;
        case 1:
            lines.push('Found 1 port:');
            break;
        default:
            lines.push(`Found ${ports.length} ports:`);
    }

    for (const port of ports) {
        lines.push(port.path);
        if (port.vendorId !== undefined || port.productId !== undefined) {
            lines.push('    Type: USB');
            lines.push(`    VID:${port.vendorId ?? '----'} PID:${port.productId ?? '----'}`);
            lines.push(`    Serial Number: ${port.serialNumber ?? ''}`);
            lines.push(`    Manufacturer: ${port.manufacturer ?? ''}`);
        } else {
            lines.push('    Type: Unknown');
        }
    }

    return lines.join('\n');
}
