import { combineReducers, configureStore } from '@reduxjs/toolkit';
import { gameReducer } from './gameSlice';

const rootReducer = combineReducers({
  game: gameReducer,
});

export type RootState = ReturnType<typeof rootReducer>;

/**
 * Build a store around the game slice. Pass `preloadedState` to resume from a saved slice.
 */
export function createAppStore(preloadedState?: Partial<RootState>) {
  return configureStore({
    reducer: rootReducer,
    preloadedState,
    middleware: (getDefaultMiddleware) =>
      getDefaultMiddleware({
        // The player registry is a Map.
        serializableCheck: { ignoredPaths: ['game.game'] },
        immutableCheck: { ignoredPaths: ['game.game'] },
      }),
  });
}

export type AppStore = ReturnType<typeof createAppStore>;
export type AppDispatch = AppStore['dispatch'];
