import { atom } from 'jotai'

export type Screen = 'transactions' | 'add' | 'help'

export const currentScreenAtom = atom<Screen>('transactions')

export const navigateAtom = atom(null, (_get, set, screen: Screen) => {
  set(currentScreenAtom, screen)
})

export const goBackAtom = atom(null, (_get, set) => {
  set(currentScreenAtom, 'transactions')
})
