export { walletService, WalletService, toWalletView, toOperationView } from './wallet.service';
export { walletController, WalletController } from './wallet.controller';
export { default as walletRoutes } from './wallet.routes';
