import { startHttp } from './connectors/http.js';
import { loadConfig } from './config/loader.js';
import { DemoDispatcher } from './backend/demo.js';

const config = loadConfig();

// Demo: in-process handlers; a real deployment passes its own Dispatcher
const dispatcher = new DemoDispatcher();
const server = startHttp(dispatcher, config);

server.on('listening', () => {
  console.log(`Direct gateway on ${config.http.bind}:${config.http.port}${config.http.path}`);
  console.log(`[HTTP] Params mode: ${config.codec.paramsMode}, methods: ${dispatcher.keys().join(', ')}`);
});
