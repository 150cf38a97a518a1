import { FastifyInstance } from 'fastify';
import { EndpointRequest, PairRequest, WirelessRequest } from '../types/Device.js';
import { AdbClient } from '../services/AdbClient.js';
import { DeviceDiscoveryService } from '../services/DeviceDiscoveryService.js';

export interface DeviceRouteServices {
  adb: AdbClient;
  discovery: DeviceDiscoveryService;
}

const endpointSchema = {
  body: {
    type: 'object',
    required: ['address', 'port'],
    properties: {
      address: { type: 'string' },
      port: { type: 'integer' },
    },
  },
};

export async function deviceRoutes(app: FastifyInstance, services: DeviceRouteServices) {
  // Refresh in the background so WebSocket clients see the new device list
  const refreshDevices = () => {
    services.discovery.refresh().catch((err) => {
      app.log.warn({ err }, 'Device refresh after state change failed');
    });
  };

  // List devices reported by adb
  app.get('/api/devices', async () => {
    const devices = await services.discovery.refresh();
    return { devices };
  });

  // Pair with a device over wireless debugging
  app.post<{ Body: PairRequest }>('/api/devices/pair', {
    schema: {
      body: {
        type: 'object',
        required: ['address', 'port', 'code'],
        properties: {
          address: { type: 'string' },
          port: { type: 'integer' },
          code: { type: 'string' },
        },
      },
    },
  }, async (request) => {
    const { address, port, code } = request.body;
    await services.adb.pair(address, port, code);
    return { success: true };
  });

  app.post<{ Body: EndpointRequest }>('/api/devices/connect', { schema: endpointSchema }, async (request) => {
    const { address, port } = request.body;
    await services.adb.connect(address, port);
    refreshDevices();
    return { success: true };
  });

  app.post<{ Body: EndpointRequest }>('/api/devices/disconnect', { schema: endpointSchema }, async (request) => {
    const { address, port } = request.body;
    await services.adb.disconnect(address, port);
    refreshDevices();
    return { success: true };
  });

  // Switch the USB-attached device to TCP mode
  app.post<{ Body: WirelessRequest }>('/api/devices/wireless', {
    schema: {
      body: {
        type: 'object',
        required: ['port'],
        properties: {
          port: { type: 'integer' },
        },
      },
    },
  }, async (request) => {
    await services.adb.enableWireless(request.body.port);
    return { success: true };
  });
}
