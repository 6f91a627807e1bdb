import { Router } from 'express';
import { getProfileRegistry } from '../differential/ProfileRegistry.js';

const router = Router();

router.get('/', (req, res) => {
  const profiles = getProfileRegistry().listProfiles();
  return res.status(200).json({
    count: profiles.length,
    profiles: profiles.map(profile => ({
      name: profile.name,
      supportsPersistence: profile.supportsPersistence,
      allowsHttp09: profile.allowsHttp09,
    })),
  });
});

router.get('/:name', (req, res, next) => {
  try {
    return res.status(200).json(getProfileRegistry().getProfile(req.params.name));
  } catch (error) {
    return next(error);
  }
});

export default router;
