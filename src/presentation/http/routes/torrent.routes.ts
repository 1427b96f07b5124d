import { NextFunction, Request, Response, Router } from 'express';
import { TorrentController } from '../controllers/TorrentController';

type Handler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to error handlers
const forward = (handler: Handler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

/**
 * Creates and configures torrent routes
 */
export function createTorrentRoutes(torrentController: TorrentController): Router {
  const router = Router();

  router.get('/torrents', forward((req, res) => torrentController.list(req, res)));
  router.post('/torrents', forward((req, res) => torrentController.add(req, res)));
  router.delete('/torrents', forward((req, res) => torrentController.remove(req, res)));

  // Bulk actions
  router.post('/torrents/start', forward((req, res) => torrentController.start(req, res)));
  router.post('/torrents/stop', forward((req, res) => torrentController.stop(req, res)));
  router.post('/torrents/toggle', forward((req, res) => torrentController.toggle(req, res)));
  router.post('/torrents/verify', forward((req, res) => torrentController.verify(req, res)));
  router.post('/torrents/announce', forward((req, res) => torrentController.announce(req, res)));
  router.post('/torrents/move', forward((req, res) => torrentController.move(req, res)));
  router.post('/torrents/files/priority', forward((req, res) => torrentController.setFilePriority(req, res)));
  router.post('/torrents/rate-limit', forward((req, res) => torrentController.limitRate(req, res)));

  router.post('/torrents/trackers', forward((req, res) => torrentController.addTrackers(req, res)));
  router.delete('/torrents/trackers', forward((req, res) => torrentController.removeTrackers(req, res)));

  return router;
}
