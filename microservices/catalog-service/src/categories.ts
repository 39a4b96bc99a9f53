export interface Category {
  key: string;
  label: string;
  image: string;
}

export const CATEGORIES: readonly Category[] = [
  {
    key: 'carte',
    label: 'Carte Collezionabili',
    image: 'https://images.unsplash.com/photo-1593113598332-cd288d649433?q=80&w=1600&auto=format&fit=crop',
  },
  {
    key: 'gadget',
    label: 'Gadget',
    image: 'https://images.unsplash.com/photo-1526657782461-9fe13402a841?q=80&w=1600&auto=format&fit=crop',
  },
  {
    key: 'videogiochi',
    label: 'Videogiochi',
    image: 'https://images.unsplash.com/photo-1542751371-adc38448a05e?q=80&w=1600&auto=format&fit=crop',
  },
];
