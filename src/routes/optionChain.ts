import { Application, Router } from 'express';
import { OptionChainController } from '../controllers/optionChainController';
import { SnapshotStore } from '../sinks/socketSink';

export const setOptionChainRoutes = (app: Application, store: SnapshotStore) => {
    const router = Router();
    const optionChainController = new OptionChainController(store);

    router.get('/option-chain', optionChainController.getOptionChain.bind(optionChainController));
    router.get('/option-chain/metrics', optionChainController.getMetrics.bind(optionChainController));
    app.use('/', router);
};
