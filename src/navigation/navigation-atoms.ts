import { atom } from 'jotai'

export type Screen = 'dashboard' | 'add' | 'help'

export const currentScreenAtom = atom<Screen>('dashboard')

// Navigation actions
export const navigateAtom = atom(null, (_get, set, screen: Screen) => {
  set(currentScreenAtom, screen)
})

export const goBackAtom = atom(null, (_get, set) => {
  set(currentScreenAtom, 'dashboard')
})
